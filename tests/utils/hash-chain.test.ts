/**
 * Tests for the generic HashChain
 *
 * Covers:
 * - Genesis entry
 * - Appending and linking
 * - Tampering detection
 */

import {
  HashChain,
  GENESIS_PREVIOUS_HASH,
  computeEntryHash,
  sha256,
} from "../../src/utils/hash-chain";

interface Note {
  text: string;
}

describe("HashChain", () => {
  it("should create a genesis entry linked to the zero hash", () => {
    const chain = new HashChain<Note>({ text: "opened" });
    const genesis = chain.getEntry(0)!;

    expect(chain.length).toBe(1);
    expect(genesis.index).toBe(0);
    expect(genesis.previousHash).toBe(GENESIS_PREVIOUS_HASH);
    expect(genesis.hash).toMatch(/^[a-f0-9]{64}$/);
    expect(genesis.hash).toBe(
      computeEntryHash(0, GENESIS_PREVIOUS_HASH, genesis.timestamp, { text: "opened" })
    );
  });

  it("should link each entry to the previous hash", () => {
    const chain = new HashChain<Note>({ text: "opened" });
    const first = chain.append({ text: "first" });
    const second = chain.append({ text: "second" });

    expect(first.index).toBe(1);
    expect(first.previousHash).toBe(chain.getEntry(0)!.hash);
    expect(second.previousHash).toBe(first.hash);
    expect(chain.getLatest()).toBe(second);
    expect(chain.verify()).toEqual({
      isValid: true,
      entriesChecked: 3,
      firstInvalidIndex: -1,
    });
  });

  it("should detect a modified payload", () => {
    const chain = new HashChain<Note>({ text: "opened" });
    chain.append({ text: "first" });
    chain.append({ text: "second" });

    chain.getAll()[1].data.text = "forged";

    expect(chain.verify()).toEqual({
      isValid: false,
      entriesChecked: 2,
      firstInvalidIndex: 1,
      error: "Entry 1 hash mismatch",
    });
  });

  it("should detect a broken link", () => {
    const chain = new HashChain<Note>({ text: "opened" });
    chain.append({ text: "first" });
    const second = chain.append({ text: "second" });

    second.previousHash = sha256("elsewhere");
    second.hash = computeEntryHash(2, second.previousHash, second.timestamp, second.data);

    const result = chain.verify();
    expect(result.isValid).toBe(false);
    expect(result.firstInvalidIndex).toBe(2);
    expect(result.error).toBe("Entry 2 previousHash does not match entry 1 hash");
  });

  it("should compute sha256 hex digests", () => {
    expect(sha256("")).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
    );
  });
});
