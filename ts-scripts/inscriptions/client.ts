import { Account, AccountAddress } from "@aptos-labs/ts-sdk";
import { RestClient } from "../aptos/types";
import { moduleFunction } from "../aptos/utils";
import { INSCRIPTIONS_MODULE, InscriptionsFunctions } from "../utils/constants";

export interface CollectionParams {
    description: string
    maxSupply: number
    name: string
    royaltyNumerator: number
    royaltyDenominator: number
    royaltyPayee: AccountAddress
    uri: string
}

export interface TokenParams {
    collection: string
    data: Uint8Array
    description: string
    name: string
    uri: string
}

/**
 * Entry points of the inscriptions package. State and event based
 * inscriptions share this API, so `moduleAddress` picks which one is used.
 */
export class InscriptionsClient {
    constructor(readonly rest: RestClient, readonly moduleAddress: AccountAddress) { }

    async createCollection(creator: Account, params: CollectionParams): Promise<string> {
        if (!Number.isInteger(params.maxSupply) || params.maxSupply <= 0)
            throw new Error(`createCollection: invalid max supply ${params.maxSupply}`)
        if (!Number.isInteger(params.royaltyNumerator) || !Number.isInteger(params.royaltyDenominator)
            || params.royaltyDenominator <= 0 || params.royaltyNumerator < 0 || params.royaltyNumerator > params.royaltyDenominator)
            throw new Error(`createCollection: invalid royalty ${params.royaltyNumerator}/${params.royaltyDenominator}`)

        return this.rest.submitEntryFunction(creator, {
            function: moduleFunction(this.moduleAddress, INSCRIPTIONS_MODULE, InscriptionsFunctions.CreateCollection),
            functionArguments: [
                params.description,
                params.maxSupply,
                params.name,
                params.royaltyNumerator,
                params.royaltyDenominator,
                params.royaltyPayee.toString(),
                params.uri,
            ],
        })
    }

    async mintToken(creator: Account, params: TokenParams): Promise<string> {
        return this.rest.submitEntryFunction(creator, {
            function: moduleFunction(this.moduleAddress, INSCRIPTIONS_MODULE, InscriptionsFunctions.MintToken),
            functionArguments: [
                params.collection,
                params.data,
                params.description,
                params.name,
                params.uri,
            ],
        })
    }
}
