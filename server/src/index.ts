import { loadConfig } from "../../src/config.ts";
import { startRelayServer } from "./app.ts";

const config = loadConfig();
const { url, close } = await startRelayServer({ port: config.relayPort });
console.log(`[chess-relay] listening on ${url}`);

let stopping = false;
async function stop(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  console.log(`[chess-relay] ${signal} received, shutting down`);
  try {
    await close();
    process.exit(0);
  } catch (err) {
    console.error("[chess-relay] shutdown failed", err);
    process.exit(1);
  }
}

process.on("SIGINT", () => void stop("SIGINT"));
process.on("SIGTERM", () => void stop("SIGTERM"));
