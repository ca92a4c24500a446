#!/usr/bin/env node
import * as fs from "fs/promises";
import { GmailClient } from "./gmailClient.js";
import { RuleStore } from "./rules.js";
import { promptYesNo } from "./cli.js";
import { runCli } from "./commands.js";
import { config, logger } from "./config.js";

async function connect(): Promise<GmailClient> {
  const gmailClient = new GmailClient({
    credentialsFile: config.gmailCredentialsFile,
    tokenFile: config.gmailTokenFile,
    maxBatchSize: config.mutationBatchSize,
    maxPageSize: config.listPageSize,
    retry: { maxRetries: config.maxRetries },
  });
  await gmailClient.initialize();
  return gmailClient;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    config,
    store: new RuleStore(config.rulesFile),
    connect,
    confirm: promptYesNo,
    readFile: (filePath) => fs.readFile(filePath, "utf-8"),
    print: (text) => console.log(text),
  });
}

main().catch((error) => {
  logger.error("Unhandled error:", error);
  process.exit(1);
});
