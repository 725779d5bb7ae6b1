export const FUND_AMOUNT = 1_000_000_000;

export const KIB = 2 ** 10;

// 62 KiB keeps the mint below the 64 KiB transaction size limit
export const PAYLOAD_SIZES = [0, KIB, 10 * KIB, 50 * KIB, 62 * KIB];

export const INSCRIPTIONS_MODULE = "inscriptions";

export const INSCRIPTIONS_NAMED_ADDRESS = "inscriptions";

export enum InscriptionsFunctions {
  CreateCollection = "create_collection",
  MintToken = "mint_token",
}

export const DEMO_COLLECTION = {
  name: "Immutable Inscriptions Demo",
  description: "Behold the power of Inscriptions on Aptos",
  maxSupply: 100,
  royaltyNumerator: 0,
  royaltyDenominator: 1,
  uri: "",
};

export const DEMO_TOKEN = {
  description: "Nyan, a cat for the next generation",
  name: "Nyan",
  uri: "https://aptos.dev/img/nyan.jpeg",
};
