import dotenv from "dotenv";

dotenv.config();

export const NETWORK = process.env.NETWORK ?? "local"

export const NODE_URL = process.env.NODE_URL

export const FAUCET_URL = process.env.FAUCET_URL

export const PRIVATE_KEY = process.env.PRIVATE_KEY

export const INSCRIPTIONS_ADDRESS = process.env.INSCRIPTIONS_ADDRESS

export const INSCRIPTIONS_DIR = process.env.INSCRIPTIONS_DIR

export const APTOS_CLI = process.env.APTOS_CLI ?? "aptos"
