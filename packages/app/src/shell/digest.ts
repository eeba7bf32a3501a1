import { createHash } from "node:crypto"

import type { DigestAlgorithm } from "../core/config.js"

// CHANGE: hash canonical text for content addressing
// WHY: stable digests are the point of canonical output
// QUOTE(TZ): "enabling stable hashing, signing, and equality checks over JSON data"
// REF: req-digest-1
// SOURCE: n/a
// FORMAT THEOREM: ∀a,b: serialize(a) = serialize(b) → digest(a) = digest(b)
// PURITY: SHELL
// EFFECT: n/a
// INVARIANT: output is lowercase hex
// COMPLEXITY: O(n)

export const digestCanonical = (text: string, algorithm: DigestAlgorithm): string =>
  createHash(algorithm).update(text, "utf8").digest("hex")
