import { Account, AccountAddress } from "@aptos-labs/ts-sdk";
import { publishPackage, PublishOptions } from "../aptos/cli";
import { ChainClients } from "../aptos/types";
import { zeroPayload } from "../aptos/utils";
import { DEMO_COLLECTION, DEMO_TOKEN, FUND_AMOUNT, INSCRIPTIONS_NAMED_ADDRESS, PAYLOAD_SIZES } from "../utils/constants";
import { InscriptionsClient } from "./client";

export interface EvaluatorDeps extends ChainClients {
    generateAccount?: () => Account
    log?: (line: string) => void
    publishOptions?: PublishOptions
}

export interface MintReport {
    size: number
    hash: string
    gasUsed: bigint
}

export async function fundedAccount({ faucet, generateAccount = () => Account.generate() }: EvaluatorDeps) {
    const account = generateAccount()
    await faucet.fundAccount(account.accountAddress, FUND_AMOUNT)
    return account
}

/** Publish the inscriptions package under a fresh account and return its address */
export async function publishInscriptions(deps: EvaluatorDeps, packageDir: string): Promise<AccountAddress> {
    const publisher = await fundedAccount(deps)
    await publishPackage(
        packageDir,
        { [INSCRIPTIONS_NAMED_ADDRESS]: publisher.accountAddress },
        publisher,
        deps.rest,
        deps.publishOptions
    )
    return publisher.accountAddress
}

/**
 * Create the demo collection, then mint one token per payload size and
 * report the gas each mint used. Every transaction is awaited before the
 * next one is sent.
 */
export async function evaluateInscriptions(
    deps: EvaluatorDeps,
    moduleAddress: AccountAddress,
    sizes: number[] = PAYLOAD_SIZES
): Promise<MintReport[]> {
    const { rest, log = console.log } = deps
    const inscriptions = new InscriptionsClient(rest, moduleAddress)

    const alice = await fundedAccount(deps)
    const balance = await rest.accountBalance(alice.accountAddress)
    log(`alice ${alice.accountAddress.toString()} balance ${balance}`)

    const collectionHash = await inscriptions.createCollection(alice, {
        ...DEMO_COLLECTION,
        royaltyPayee: alice.accountAddress,
    })
    await rest.waitForTransaction(collectionHash)

    const reports: MintReport[] = []
    for (const size of sizes) {
        const hash = await inscriptions.mintToken(alice, {
            ...DEMO_TOKEN,
            collection: DEMO_COLLECTION.name,
            data: zeroPayload(size),
        })
        await rest.waitForTransaction(hash)
        const { gasUsed } = await rest.transactionByHash(hash)
        log(`${size} -- ${gasUsed}`)
        reports.push({ size, hash, gasUsed })
    }
    return reports
}
