/**
 * Merkle Proof Tests
 * Test suite for RFC 9162 inclusion and consistency proof records
 */

import { describe, test, expect } from "vitest";

async function buildTree(size: number) {
  const { MerkleTree } = await import("../../../src/lib/merkle/merkle-tree.ts");
  const { createTreeHasher } = await import("../../../src/lib/hash/tree-hasher.ts");

  const hasher = createTreeHasher("sha256");
  const tree = new MerkleTree(hasher);
  const leaves: Uint8Array[] = [];

  for (let i = 0; i < size; i++) {
    const leaf = new Uint8Array(32);
    leaf.fill(i);
    leaves.push(leaf);
    tree.addLeaf(leaf);
  }

  return { hasher, tree, leaves };
}

describe("Inclusion Proof Generation", () => {
  test("generates inclusion proof for single-entry tree", async () => {
    const { generateInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(1);

    const proof = generateInclusionProof(tree, 0, 1);

    expect(proof).toEqual({ leafIndex: 0, treeSize: 1, auditPath: [] });
  });

  test("generates inclusion proof for first entry in 2-entry tree", async () => {
    const { generateInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(2);

    const proof = generateInclusionProof(tree, 0, 2);

    expect(proof?.auditPath).toEqual([tree.leafHash(2)]);
  });

  test("generates inclusion proof for entry in larger tree", async () => {
    const { generateInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(8);

    const proof = generateInclusionProof(tree, 3, 8);

    expect(proof?.leafIndex).toBe(3);
    expect(proof?.treeSize).toBe(8);
    expect(proof?.auditPath.length).toBe(3); // log2(8) = 3
  });

  test("generates proof against an earlier tree size", async () => {
    const { generateInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(8);

    const proof = generateInclusionProof(tree, 4, 5);

    // Leaf 4 is the lone right subtree of a 5-leaf tree
    expect(proof?.auditPath).toEqual([tree.rootAtSnapshot(4)]);
  });

  test("returns null for invalid leaf index", async () => {
    const { generateInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(3);

    expect(generateInclusionProof(tree, 5, 3)).toBeNull();
    expect(generateInclusionProof(tree, 3, 3)).toBeNull();
    expect(generateInclusionProof(tree, -1, 3)).toBeNull();
  });

  test("returns null for tree size beyond the tree", async () => {
    const { generateInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(3);

    expect(generateInclusionProof(tree, 0, 4)).toBeNull();
  });
});

describe("Inclusion Proof Verification", () => {
  test("verifies valid inclusion proof for single entry", async () => {
    const { generateInclusionProof, verifyInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { hasher, tree, leaves } = await buildTree(1);

    const proof = generateInclusionProof(tree, 0, 1);

    expect(proof).not.toBeNull();
    if (proof) {
      expect(verifyInclusionProof(hasher, leaves[0], proof, tree.currentRoot())).toBe(true);
    }
  });

  test("verifies all entries in tree have valid proofs", async () => {
    const { generateInclusionProof, verifyInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { hasher, tree, leaves } = await buildTree(7);
    const root = tree.currentRoot();

    for (let i = 0; i < 7; i++) {
      const proof = generateInclusionProof(tree, i, 7);
      expect(proof).not.toBeNull();
      if (proof) {
        expect(verifyInclusionProof(hasher, leaves[i], proof, root)).toBe(true);
      }
    }
  });

  test("rejects proof with wrong leaf data", async () => {
    const { generateInclusionProof, verifyInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { hasher, tree } = await buildTree(4);

    const proof = generateInclusionProof(tree, 2, 4);
    const wrongLeaf = new Uint8Array(32);
    wrongLeaf.fill(99);

    expect(proof).not.toBeNull();
    if (proof) {
      expect(verifyInclusionProof(hasher, wrongLeaf, proof, tree.currentRoot())).toBe(false);
    }
  });

  test("rejects proof with tampered audit path", async () => {
    const { generateInclusionProof, verifyInclusionProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { hasher, tree, leaves } = await buildTree(8);

    const proof = generateInclusionProof(tree, 3, 8);

    expect(proof).not.toBeNull();
    if (proof) {
      proof.auditPath[0][0] ^= 0xff;
      expect(verifyInclusionProof(hasher, leaves[3], proof, tree.currentRoot())).toBe(false);
    }
  });
});

describe("Consistency Proof Generation", () => {
  test("generates empty proof for same tree size", async () => {
    const { generateConsistencyProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(4);

    const proof = generateConsistencyProof(tree, 4, 4);

    expect(proof).toEqual({ oldSize: 4, newSize: 4, proof: [] });
  });

  test("generates empty proof from an empty tree", async () => {
    const { generateConsistencyProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(4);

    expect(generateConsistencyProof(tree, 0, 4)).toEqual({ oldSize: 0, newSize: 4, proof: [] });
  });

  test("generates proof for growing tree", async () => {
    const { generateConsistencyProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { hasher, tree } = await buildTree(8);

    const proof = generateConsistencyProof(tree, 4, 8);

    // The old tree is the left half; the new tree adds the right half
    const rightHalf = hasher.hashChildren(
      hasher.hashChildren(tree.leafHash(5), tree.leafHash(6)),
      hasher.hashChildren(tree.leafHash(7), tree.leafHash(8))
    );
    expect(proof?.proof).toEqual([rightHalf]);
  });

  test("returns null for invalid tree sizes", async () => {
    const { generateConsistencyProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { tree } = await buildTree(4);

    expect(generateConsistencyProof(tree, 8, 4)).toBeNull();
    expect(generateConsistencyProof(tree, 0, 0)).toBeNull();
    expect(generateConsistencyProof(tree, 2, 5)).toBeNull();
  });
});

describe("Consistency Proof Verification", () => {
  test("verifies multiple consistency proofs as tree grows", async () => {
    const { MerkleTree } = await import("../../../src/lib/merkle/merkle-tree.ts");
    const { createTreeHasher } = await import("../../../src/lib/hash/tree-hasher.ts");
    const { generateConsistencyProof, verifyConsistencyProof } = await import("../../../src/lib/merkle/proofs.ts");

    const hasher = createTreeHasher("sha256");
    const tree = new MerkleTree(hasher);
    const roots: Uint8Array[] = [];

    // Build tree incrementally and collect roots
    for (let size = 1; size <= 8; size++) {
      const leaf = new Uint8Array(32);
      leaf.fill(size - 1);
      tree.addLeaf(leaf);
      roots.push(tree.currentRoot());
    }

    // Verify consistency between all pairs
    for (let oldSize = 1; oldSize <= 8; oldSize++) {
      for (let newSize = oldSize; newSize <= 8; newSize++) {
        const proof = generateConsistencyProof(tree, oldSize, newSize);
        expect(proof).not.toBeNull();
        if (proof) {
          expect(verifyConsistencyProof(hasher, proof, roots[oldSize - 1], roots[newSize - 1])).toBe(true);
        }
      }
    }
  });

  test("rejects proof with tampered hashes", async () => {
    const { generateConsistencyProof, verifyConsistencyProof } = await import("../../../src/lib/merkle/proofs.ts");
    const { hasher, tree } = await buildTree(8);
    const oldRoot = tree.rootAtSnapshot(3);
    const newRoot = tree.currentRoot();

    const proof = generateConsistencyProof(tree, 3, 8);

    expect(proof).not.toBeNull();
    if (proof) {
      proof.proof[0][0] ^= 0xff;
      expect(verifyConsistencyProof(hasher, proof, oldRoot, newRoot)).toBe(false);
    }
  });
});
