#!/usr/bin/env node
import { Command } from "commander";
import { createAppContext } from "./app-context.js";
import { runDoctor } from "./diagnostics/doctor.js";
import { ConfigError } from "./errors.js";

interface MirrorOptions {
  apiKey?: string;
  sessionCookie?: string;
  nodeId?: string;
  baseUrl?: string;
  outputDir?: string;
  pageRetryLimit?: string;
  progress: boolean;
}

const program = new Command();
program.name("album-mirror").description("Mirror a remote folder/album tree onto local disk");

program
  .command("mirror")
  .description("Walk the remote tree from the root node and download missing or changed images")
  .option("--api-key <key>", "API key (MIRROR_API_KEY)")
  .option("--session-cookie <value>", "SMSESS session cookie (MIRROR_SESSION_COOKIE)")
  .option("--node-id <id>", "Root folder node id (MIRROR_ROOT_NODE_ID)")
  .option("--base-url <url>", "Remote base URL (MIRROR_BASE_URL)")
  .option("--output-dir <dir>", "Local directory to mirror into (MIRROR_OUTPUT_DIR)")
  .option("--page-retry-limit <n>", "Failed attempts allowed per page, 0 = unlimited (MIRROR_PAGE_RETRY_LIMIT)")
  .option("--no-progress", "Disable the progress indicator")
  .action(async (options: MirrorOptions) => {
    const app = createAppContext({
      apiKey: options.apiKey,
      sessionCookie: options.sessionCookie,
      nodeId: options.nodeId,
      baseUrl: options.baseUrl,
      outputDir: options.outputDir,
      pageRetryLimit: options.pageRetryLimit,
      progress: options.progress
    });

    app.logger.info({ nodeId: app.config.rootNodeId, outputDir: app.config.outputDir }, "Starting mirror");
    const summary = await app.walker.mirror(app.config.rootNodeId, app.config.outputDir);
    console.log(JSON.stringify(summary, null, 2));
    if (summary.incomplete.length > 0) process.exitCode = 1;
  });

program
  .command("doctor")
  .description("Validate .env configuration before network operations")
  .action(async () => {
    const report = runDoctor();
    console.log(JSON.stringify(report, null, 2));
    if (!report.ok) process.exitCode = 1;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error(error);
  }
  process.exit(1);
});
