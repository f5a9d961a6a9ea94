import { describe, it, expect } from "vitest";
import { generateMnemonic, mnemonicToSeedSync } from "@scure/bip39";
import { wordlist } from "@scure/bip39/wordlists/english";
import { config, seedFromMnemonic, settingsFromConfig } from "../src/config.js";

describe("seedFromMnemonic", () => {
  it("derives the BIP-39 seed, ignoring extra whitespace", () => {
    const mnemonic = generateMnemonic(wordlist);
    const spaced = `  ${mnemonic.split(" ").join("   ")}\n`;
    const { seed, ephemeral } = seedFromMnemonic(spaced);
    expect(ephemeral).toBe(false);
    expect(seed).toEqual(mnemonicToSeedSync(mnemonic));
  });

  it("generates a throwaway seed when none is configured", () => {
    const a = seedFromMnemonic("");
    const b = seedFromMnemonic("");
    expect(a.ephemeral).toBe(true);
    expect(a.seed).toHaveLength(64);
    expect(a.seed).not.toEqual(b.seed);
  });

  it("rejects words outside the wordlist", () => {
    expect(() => seedFromMnemonic("test secret placeholder")).toThrow("not a valid BIP-39 mnemonic");
  });
});

describe("settingsFromConfig", () => {
  it("builds contact entries and omits empty optional text", () => {
    const settings = settingsFromConfig({
      ...config,
      contactEmail: "ops@example.com",
      contactNostr: "",
      motd: "",
      descriptionLong: "longer text",
    });
    expect(settings.contact).toEqual([{ method: "email", info: "ops@example.com" }]);
    expect(settings.motd).toBeUndefined();
    expect(settings.descriptionLong).toBe("longer text");
    expect(settings.units).toEqual([...config.units]);
  });
});
