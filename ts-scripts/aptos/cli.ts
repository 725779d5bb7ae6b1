import { Account, AccountAddress } from "@aptos-labs/ts-sdk";
import { execFile as execFileCb } from "node:child_process";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { RestClient } from "./types";

const execFile = promisify(execFileCb);

export type CommandRunner = (file: string, args: string[]) => Promise<void>

export interface PublishOptions {
    /** Aptos CLI binary, `aptos` on the PATH by default */
    cli?: string
    run?: CommandRunner
}

export interface PackageArtifacts {
    name: string
    metadata: Uint8Array
    modules: Uint8Array[]
}

async function execCommand(file: string, args: string[]) {
    try {
        await execFile(file, args)
    } catch (e) {
        const stderr = e instanceof Error && "stderr" in e ? String(e.stderr).trim() : ""
        throw new Error(`${file} ${args.slice(0, 2).join(" ")} failed${stderr ? `: ${stderr}` : ""}`, { cause: e })
    }
}

export function namedAddressesArg(namedAddresses: Record<string, AccountAddress>) {
    return Object.entries(namedAddresses)
        .map(([name, address]) => `${name}=${address.toString()}`)
        .join(",")
}

export function compileArgs(packageDir: string, namedAddresses: Record<string, AccountAddress>) {
    const args = ["move", "compile", "--save-metadata", "--package-dir", packageDir]
    if (Object.keys(namedAddresses).length > 0) args.push("--named-addresses", namedAddressesArg(namedAddresses))
    return args
}

export async function compilePackage(
    packageDir: string,
    namedAddresses: Record<string, AccountAddress>,
    { cli = "aptos", run = execCommand }: PublishOptions = {}
) {
    await run(cli, compileArgs(packageDir, namedAddresses))
}

/** `name` from the `[package]` section of Move.toml */
export function parsePackageName(manifest: string): string {
    let section = ""
    for (const raw of manifest.split(/\r?\n/)) {
        const line = raw.replace(/\s+#.*$/, "").trim()
        const header = line.match(/^\[([^\]]+)\]$/)
        if (header) {
            section = header[1].trim()
            continue
        }
        if (section !== "package") continue
        const name = line.match(/^name\s*=\s*["']([^"']+)["']/)
        if (name) return name[1]
    }
    throw new Error("Move.toml: missing package name")
}

/**
 * Metadata and top level `.mv` files of a compiled package. Modules come in
 * file name order, which is only a valid publish order when no module
 * depends on one whose name sorts after it.
 */
export async function readPackageArtifacts(packageDir: string): Promise<PackageArtifacts> {
    const name = parsePackageName(await readFile(path.join(packageDir, "Move.toml"), "utf-8"))
    const buildDir = path.join(packageDir, "build", name)

    let metadata: Uint8Array
    try {
        metadata = new Uint8Array(await readFile(path.join(buildDir, "package-metadata.bcs")))
    } catch (e) {
        throw new Error(`no package metadata in ${buildDir}, was it compiled with --save-metadata?`, { cause: e })
    }

    const modulesDir = path.join(buildDir, "bytecode_modules")
    const entries = await readdir(modulesDir, { withFileTypes: true })
    const files = entries
        .filter(entry => entry.isFile() && entry.name.endsWith(".mv"))
        .map(entry => entry.name)
        .sort()
    if (files.length === 0) throw new Error(`no modules in ${modulesDir}`)

    const modules: Uint8Array[] = []
    for (const file of files) {
        modules.push(new Uint8Array(await readFile(path.join(modulesDir, file))))
    }
    return { name, metadata, modules }
}

/** Compile the Move package with the CLI, then publish it as `signer` */
export async function publishPackage(
    packageDir: string,
    namedAddresses: Record<string, AccountAddress>,
    signer: Account,
    rest: RestClient,
    options: PublishOptions = {}
): Promise<string> {
    await compilePackage(packageDir, namedAddresses, options)
    const { metadata, modules } = await readPackageArtifacts(packageDir)
    const hash = await rest.publishPackage(signer, metadata, modules)
    await rest.waitForTransaction(hash)
    return hash
}
