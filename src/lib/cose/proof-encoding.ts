/**
 * CBOR Proof Encoding
 * RFC 9162 proof bodies as carried in COSE receipts
 * (draft-ietf-cose-merkle-tree-proofs):
 *
 *   inclusion-proof   = [ tree-size: uint, leaf-index: uint, inclusion-path: [ + bstr ] ]
 *   consistency-proof = [ tree-size-1: uint, tree-size-2: uint, consistency-path: [ + bstr ] ]
 */

import { encode as cborEncode, decode as cborDecode } from "cbor-x";
import { InvalidProofError } from "../errors.ts";
import type { ConsistencyProof, InclusionProof } from "../merkle/proofs.ts";
import { isCount } from "../merkle/tree-math.ts";

/**
 * Encode an inclusion proof as a CBOR array
 */
export function encodeInclusionProof(proof: InclusionProof): Uint8Array {
  return encodeProofArray(proof.treeSize, proof.leafIndex, proof.auditPath);
}

/**
 * Decode an inclusion proof from CBOR
 */
export function decodeInclusionProof(encoded: Uint8Array): InclusionProof {
  const [treeSize, leafIndex, auditPath] = decodeProofArray(encoded, "inclusion");

  if (leafIndex >= treeSize) {
    throw new InvalidProofError(`Leaf index ${leafIndex} out of bounds for tree size ${treeSize}`);
  }

  return { leafIndex, treeSize, auditPath };
}

/**
 * Encode a consistency proof as a CBOR array
 */
export function encodeConsistencyProof(proof: ConsistencyProof): Uint8Array {
  return encodeProofArray(proof.oldSize, proof.newSize, proof.proof);
}

/**
 * Decode a consistency proof from CBOR
 */
export function decodeConsistencyProof(encoded: Uint8Array): ConsistencyProof {
  const [oldSize, newSize, proof] = decodeProofArray(encoded, "consistency");

  if (oldSize > newSize) {
    throw new InvalidProofError(`Old size ${oldSize} cannot be greater than new size ${newSize}`);
  }

  return { oldSize, newSize, proof };
}

function encodeProofArray(first: number, second: number, hashes: readonly Uint8Array[]): Uint8Array {
  // Note: Use Buffer.from() to avoid the typed-array tag (d840) cbor-x adds to Uint8Array
  const array = [first, second, hashes.map((hash) => Buffer.from(hash))];
  return new Uint8Array(cborEncode(array));
}

function decodeProofArray(
  encoded: Uint8Array,
  kind: "inclusion" | "consistency"
): [number, number, Uint8Array[]] {
  let decoded: unknown;
  try {
    decoded = cborDecode(encoded);
  } catch (error) {
    throw new InvalidProofError(
      `Invalid ${kind} proof encoding`,
      error instanceof Error ? error : undefined
    );
  }

  if (!Array.isArray(decoded) || decoded.length !== 3) {
    throw new InvalidProofError(`Invalid ${kind} proof structure`);
  }

  const [first, second, hashes] = decoded;

  if (typeof first !== "number" || !isCount(first) || typeof second !== "number" || !isCount(second)) {
    throw new InvalidProofError(`Invalid ${kind} proof sizes`);
  }

  if (!Array.isArray(hashes)) {
    throw new InvalidProofError(`Invalid ${kind} proof path`);
  }

  const path: Uint8Array[] = [];
  for (const hash of hashes) {
    if (!(hash instanceof Uint8Array)) {
      throw new InvalidProofError(`Invalid ${kind} proof path entry`);
    }
    path.push(new Uint8Array(hash));
  }

  return [first, second, path];
}
