import { Account, AccountAddress, Aptos, AptosConfig, InputEntryFunctionData } from "@aptos-labs/ts-sdk";
import { NetworkData } from "../contexts";
import { ChainClients, FaucetClient, RestClient, TransactionSummary } from "./types";
import { summarizeTransaction } from "./utils";

export class AptosRestClient implements RestClient {
    constructor(readonly aptos: Aptos) { }

    async accountBalance(address: AccountAddress): Promise<bigint> {
        const amount = await this.aptos.getAccountAPTAmount({ accountAddress: address })
        return BigInt(amount)
    }

    async submitEntryFunction(signer: Account, data: InputEntryFunctionData): Promise<string> {
        const transaction = await this.aptos.transaction.build.simple({
            sender: signer.accountAddress,
            data,
        })
        const pending = await this.aptos.signAndSubmitTransaction({ signer, transaction })
        return pending.hash
    }

    async publishPackage(signer: Account, metadata: Uint8Array, modules: Uint8Array[]): Promise<string> {
        const transaction = await this.aptos.publishPackageTransaction({
            account: signer.accountAddress,
            metadataBytes: metadata,
            moduleBytecode: modules,
        })
        const pending = await this.aptos.signAndSubmitTransaction({ signer, transaction })
        return pending.hash
    }

    /** Rejects when the transaction aborted or did not commit in time */
    async waitForTransaction(hash: string): Promise<void> {
        await this.aptos.waitForTransaction({ transactionHash: hash })
    }

    async transactionByHash(hash: string): Promise<TransactionSummary> {
        const response = await this.aptos.getTransactionByHash({ transactionHash: hash })
        return summarizeTransaction(response)
    }
}

export class AptosFaucetClient implements FaucetClient {
    constructor(readonly aptos: Aptos) { }

    async fundAccount(address: AccountAddress, amount: number): Promise<void> {
        await this.aptos.fundAccount({ accountAddress: address, amount })
    }
}

export function createClients(data: NetworkData): ChainClients {
    const aptos = new Aptos(new AptosConfig({
        network: data.network,
        fullnode: data.NODE_URL,
        faucet: data.FAUCET_URL,
    }))
    return {
        rest: new AptosRestClient(aptos),
        faucet: new AptosFaucetClient(aptos),
    }
}
