import { Network } from "@aptos-labs/ts-sdk";

export interface NetworkData {
    network: Network
    NODE_URL: string
    FAUCET_URL: string
}

export namespace LocalnetData {

    export const NETWORK = Network.LOCAL

    export const NODE_URL = "http://127.0.0.1:8080/v1"

    export const FAUCET_URL = "http://127.0.0.1:8081"

}

export namespace DevnetData {

    export const NETWORK = Network.DEVNET

    export const NODE_URL = "https://api.devnet.aptoslabs.com/v1"

    export const FAUCET_URL = "https://faucet.devnet.aptoslabs.com"

}

export type NetworkOverrides = {
    nodeUrl?: string
    faucetUrl?: string
}

export function getNetworkData(name: string, overrides: NetworkOverrides = {}): NetworkData {
    switch (name) {
        case "local":
            return {
                network: LocalnetData.NETWORK,
                NODE_URL: overrides.nodeUrl ?? LocalnetData.NODE_URL,
                FAUCET_URL: overrides.faucetUrl ?? LocalnetData.FAUCET_URL,
            }
        case "devnet":
            return {
                network: DevnetData.NETWORK,
                NODE_URL: overrides.nodeUrl ?? DevnetData.NODE_URL,
                FAUCET_URL: overrides.faucetUrl ?? DevnetData.FAUCET_URL,
            }
        case "custom":
            if (!overrides.nodeUrl || !overrides.faucetUrl)
                throw new Error("custom network needs both NODE_URL and FAUCET_URL")
            return {
                network: Network.CUSTOM,
                NODE_URL: overrides.nodeUrl,
                FAUCET_URL: overrides.faucetUrl,
            }
        default:
            throw new Error(`unknown network: ${name}`)
    }
}
