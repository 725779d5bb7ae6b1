import { APTOS_CLI, FAUCET_URL, INSCRIPTIONS_DIR, NETWORK, NODE_URL } from "../../env";
import { createClients } from "../aptos";
import { networkFromEnv } from "../utils";
import { publishInscriptions } from "./evaluator";

async function main() {
    if (!INSCRIPTIONS_DIR) throw new Error("INSCRIPTIONS_DIR is not set")

    const clients = createClients(networkFromEnv({ NETWORK, NODE_URL, FAUCET_URL }))

    const address = await publishInscriptions({ ...clients, publishOptions: { cli: APTOS_CLI } }, INSCRIPTIONS_DIR)
    console.log(address.toString())
}

main()
    .then(() => process.exit(0))
    .catch((error) => {
        console.error(error);
        process.exit(1);
    });
