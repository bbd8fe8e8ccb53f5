import "dotenv/config";
import { startServer } from "./start.js";

async function main(): Promise<void> {
  const server = await startServer();
  if (!server) process.exit(1);
}

void main();
