import type { Account, AccountAddress, InputEntryFunctionData } from "@aptos-labs/ts-sdk"

export interface TransactionSummary {
    hash: string
    success: boolean
    vmStatus: string
    gasUsed: bigint
}

export interface FaucetClient {
    fundAccount(address: AccountAddress, amount: number): Promise<void>
}

export interface RestClient {
    accountBalance(address: AccountAddress): Promise<bigint>
    submitEntryFunction(signer: Account, data: InputEntryFunctionData): Promise<string>
    publishPackage(signer: Account, metadata: Uint8Array, modules: Uint8Array[]): Promise<string>
    waitForTransaction(hash: string): Promise<void>
    transactionByHash(hash: string): Promise<TransactionSummary>
}

export interface ChainClients {
    rest: RestClient
    faucet: FaucetClient
}
