#!/usr/bin/env node
import "dotenv/config";
import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { Command, InvalidArgumentError, Option } from "commander";
import packageJson from "../package.json";
import { type ReadableArticle, createReadabilityPipeline } from "./acquisition";
import { loadConfig } from "./config";
import { LogLevel, setLogLevel } from "./utils/logger";

type OutputFormat = "json" | "html" | "text";

const OUTPUT_FORMATS: OutputFormat[] = ["json", "html", "text"];

function formatArticle(article: ReadableArticle, format: OutputFormat): string {
  switch (format) {
    case "html":
      return article.content;
    case "text":
      return article.textContent;
    case "json":
      return JSON.stringify(article, null, 2);
  }
}

function parseTimeout(value: string): number {
  const timeout = Number.parseInt(value, 10);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError("Timeout must be a positive number of milliseconds.");
  }
  return timeout;
}

/** "-" reads standard input */
function openInput(file: string): Readable {
  return file === "-" ? process.stdin : createReadStream(file);
}

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const pipeline = createReadabilityPipeline({ timeout: config.timeoutMs });

  // Ctrl+C aborts whatever is in flight; the pipeline releases its streams
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const formatOption = () =>
    new Option("-f, --format <format>", "Output format").choices(OUTPUT_FORMATS).default("json");

  const program = new Command();

  program
    .name("readable-acquire")
    .description("Fetch web pages and extract their readable content")
    .version(packageJson.version)
    .option("--verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false);

  program
    .command("fetch <url>")
    .description("Fetch a URL and print its readable article")
    .option("-t, --timeout <ms>", "Request timeout in milliseconds", parseTimeout, config.timeoutMs)
    .addOption(formatOption())
    .action(async (url: string, options: { timeout: number; format: OutputFormat }) => {
      const article = await pipeline.acquireFromUrl(url, {
        timeout: options.timeout,
        signal: controller.signal,
      });
      console.log(formatArticle(article, options.format));
    });

  program
    .command("parse <file>")
    .description("Extract the readable article from a local HTML file ('-' for stdin)")
    .requiredOption("-u, --url <url>", "URL the page was retrieved from")
    .addOption(formatOption())
    .action(async (file: string, options: { url: string; format: OutputFormat }) => {
      const article = await pipeline.acquireFromStream(openInput(file), options.url, {
        signal: controller.signal,
      });
      console.log(formatArticle(article, options.format));
    });

  program
    .command("check <file>")
    .description("Check whether a local HTML file ('-' for stdin) looks readable")
    .action(async (file: string) => {
      const readable = await pipeline.checkStream(openInput(file), {
        signal: controller.signal,
      });
      console.log(String(readable));
      process.exitCode = readable ? 0 : 2;
    });

  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts();
    if (options.silent) {
      // silent wins over verbose
      setLogLevel(LogLevel.ERROR);
    } else if (options.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

  await program.parseAsync();
}

main().catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
