import { AccountAddress, MoveFunctionId, TransactionResponse, TransactionResponseType } from "@aptos-labs/ts-sdk";
import { TransactionSummary } from "../types";

/** `0x…::module::function` identifier of an entry function */
export function moduleFunction(address: AccountAddress, module: string, fn: string): MoveFunctionId {
    return `${address.toString()}::${module}::${fn}`
}

/** Inscription payload of `size` zero bytes */
export function zeroPayload(size: number): Uint8Array {
    if (!Number.isInteger(size) || size < 0) throw new Error(`zeroPayload: invalid size ${size}`)
    return new Uint8Array(size)
}

export function summarizeTransaction(response: TransactionResponse): TransactionSummary {
    if (response.type === TransactionResponseType.Pending)
        throw new Error(`transaction ${response.hash} is still pending`)
    return {
        hash: response.hash,
        success: response.success,
        vmStatus: response.vm_status,
        gasUsed: BigInt(response.gas_used),
    }
}
