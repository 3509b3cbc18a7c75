#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import { runServe } from "./commands/serve.js";
import { runSummarize } from "./commands/summarize.js";

const program = new Command();

program
  .name("doc-summarizer")
  .description("Summarize PDF and plain-text documents with a pretrained model.")
  .version("0.1.0");

program
  .command("serve")
  .description("Start the HTTP service and the web UI")
  .option("--port <number>", "Port to listen on (default: PORT or 5000)")
  .option("--host <host>", "Interface to bind (default: HOST or 127.0.0.1)")
  .option("--provider <name>", "Summarizer provider (huggingface, ollama or deepseek)")
  .action(async (opts) => {
    try {
      await runServe({
        port: opts.port === undefined ? undefined : Number(opts.port),
        host: opts.host,
        provider: opts.provider,
      });
    } catch (error) {
      fail(error);
    }
  });

program
  .command("summarize")
  .description("Send a document to a running service and print its summary")
  .argument("<file>", "Path to a .pdf or .txt file")
  .option("--api-url <url>", "Service base URL (default: SUMMARIZER_API_URL)")
  .option("--type <mime>", "Declared MIME type (default: inferred from the extension)")
  .option("--timeout <duration>", "Give up after this long (e.g. 30s, 2m)", "30s")
  .action(async (file: string, opts) => {
    try {
      const summary = await runSummarize(file, {
        apiUrl: opts.apiUrl,
        type: opts.type,
        timeout: opts.timeout,
      });
      console.log(summary);
    } catch (error) {
      fail(error);
    }
  });

function fail(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[error] ${message}`);
  process.exitCode = 1;
}

// `npm run dev -- summarize notes.txt` forwards a literal "--"; drop it.
const argv = process.argv.slice();
const delimiterIndex = argv.indexOf("--");
if (delimiterIndex !== -1) {
  argv.splice(delimiterIndex, 1);
}

await program.parseAsync(argv);
