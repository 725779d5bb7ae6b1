import { FAUCET_URL, NETWORK, NODE_URL, PRIVATE_KEY } from "../../env";
import { createClients } from "../aptos";
import { accountFromPrivateKey, networkFromEnv } from "../utils";

async function main() {
    const { rest } = createClients(networkFromEnv({ NETWORK, NODE_URL, FAUCET_URL }))
    const account = accountFromPrivateKey(PRIVATE_KEY)
    console.log(account.accountAddress.toString(), await rest.accountBalance(account.accountAddress))
}

main()
    .then(() => process.exit(0))
    .catch((error) => {
        console.error(error);
        process.exit(1);
    });
