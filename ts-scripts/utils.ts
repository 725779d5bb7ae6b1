import { Account, AccountAddress, Ed25519PrivateKey } from "@aptos-labs/ts-sdk";
import { getNetworkData, NetworkData } from "./contexts";

export type NetworkEnv = {
  NETWORK: string
  NODE_URL?: string
  FAUCET_URL?: string
}

export function networkFromEnv(env: NetworkEnv): NetworkData {
  return getNetworkData(env.NETWORK, { nodeUrl: env.NODE_URL, faucetUrl: env.FAUCET_URL });
}

export function accountFromPrivateKey(privateKey: string | undefined): Account {
  if (!privateKey) throw new Error("PRIVATE_KEY is not set");
  return Account.fromPrivateKey({ privateKey: new Ed25519PrivateKey(privateKey) });
}

export function parseModuleAddress(address: string | undefined): AccountAddress | undefined {
  if (!address) return undefined;
  try {
    return AccountAddress.from(address);
  } catch (e) {
    throw new Error(`invalid module address: ${address}`, { cause: e });
  }
}
