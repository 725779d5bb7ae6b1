import { FAUCET_URL, INSCRIPTIONS_ADDRESS, INSCRIPTIONS_DIR, APTOS_CLI, NETWORK, NODE_URL } from "../../env";
import { createClients } from "../aptos";
import { networkFromEnv, parseModuleAddress } from "../utils";
import { evaluateInscriptions, publishInscriptions } from "./evaluator";

async function main() {
    const network = networkFromEnv({ NETWORK, NODE_URL, FAUCET_URL })
    const clients = createClients(network)
    const deps = { ...clients, publishOptions: { cli: APTOS_CLI } }

    let moduleAddress = parseModuleAddress(INSCRIPTIONS_ADDRESS)
    if (INSCRIPTIONS_DIR) {
        console.log("publishing", INSCRIPTIONS_DIR)
        moduleAddress = await publishInscriptions(deps, INSCRIPTIONS_DIR)
        console.log("inscriptions published at", moduleAddress.toString())
    }
    if (!moduleAddress) throw new Error("set INSCRIPTIONS_ADDRESS or INSCRIPTIONS_DIR")

    console.log(`evaluating inscriptions at ${moduleAddress.toString()} on ${network.NODE_URL}`)
    await evaluateInscriptions(deps, moduleAddress)
}

main()
    .then(() => process.exit(0))
    .catch((error) => {
        console.error(error);
        process.exit(1);
    });
