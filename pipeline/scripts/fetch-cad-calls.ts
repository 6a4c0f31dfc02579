#!/usr/bin/env node
/**
 * Fetch one page of CAD calls for a single agency.
 *
 * Writes data to cadcalls_results/<site>_cadcalls_<agency>_<timestamp>.json,
 * or a <site>_debug_<agency>_<timestamp>.json bundle when the portal fails.
 *
 * Usage: npm run fetch -- --agency-id 386 --take 5 --no-closed
 */
import { EXIT_CODES } from "../services/cad-calls-service.js";
import { runCadCallsCli } from "./cad-calls-cli.js";

const main = async () => {
  process.exitCode = await runCadCallsCli(process.argv.slice(2));
};

main().catch((error) => {
  console.error("Fatal error in fetch-cad-calls:");
  console.error(error);
  process.exit(EXIT_CODES.internalError);
});
