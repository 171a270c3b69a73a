import * as fs from "fs";
import { loadConfig, type RenamerConfig } from "./core/config.js";
import { PdfCoverExtractor } from "./extractors/coverExtractor.js";
import { CoverInferencer } from "./extractors/coverInferencer.js";
import { GeminiCoverModel } from "./modelGemini.js";
import { BatchOrchestrator } from "./renamer/batchOrchestrator.js";
import { ConfigError } from "./renamer/errors.js";
import { formatSummary } from "./renamer/report.js";
import type { BatchReport } from "./renamer/types.js";
import { createLogger, type Logger } from "./utils/logger.js";

export interface CliArgs {
  execute: boolean;
  help: boolean;
  inputDir?: string;
  outputDir?: string;
}

export const USAGE = [
  "Usage: pdf-cover-renamer [--execute] [--input=<dir>] [--output=<dir>]",
  "  --execute: Execute rename operations (default is Dry Run)",
  "  --input:   Folder holding the PDFs to rename (default ./未整理)",
  "  --output:  Folder the renamed PDFs are moved to (default ./已整理)",
].join("\n");

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { execute: false, help: false };
  for (const arg of argv) {
    if (arg === "--execute") {
      args.execute = true;
    } else if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg.startsWith("--input=")) {
      args.inputDir = arg.slice("--input=".length);
    } else if (arg.startsWith("--output=")) {
      args.outputDir = arg.slice("--output=".length);
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`, [arg]);
    }
  }
  return args;
}

export async function runBatch(config: RenamerConfig, execute: boolean, logger: Logger): Promise<BatchReport> {
  // Ensure folders exist
  fs.mkdirSync(config.inputDir, { recursive: true });
  fs.mkdirSync(config.outputDir, { recursive: true });

  const model = new GeminiCoverModel({
    apiKey: config.apiKey,
    modelId: config.modelId,
    requestTimeoutMs: config.requestTimeoutMs,
  });
  const orchestrator = new BatchOrchestrator(
    {
      inputDir: config.inputDir,
      outputDir: config.outputDir,
      mode: execute ? "execute" : "preview",
      requestDelayMs: config.requestDelayMs,
      maxTitleLength: config.maxTitleLength,
    },
    {
      extractor: new PdfCoverExtractor(logger),
      inferencer: new CoverInferencer(model, {
        coverMode: config.coverMode,
        minCoverTextLength: config.minCoverTextLength,
        logger,
      }),
      logger,
    }
  );
  return orchestrator.run();
}

export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let args: CliArgs;
  let config: RenamerConfig;
  try {
    args = parseArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return 0;
    }
    config = loadConfig(env, { inputDir: args.inputDir, outputDir: args.outputDir });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  const logger = createLogger({ level: config.logLevel });
  logger.info(`Running in ${args.execute ? "EXECUTION" : "DRY RUN"} mode...`);

  const report = await runBatch(config, args.execute, logger);
  console.log(formatSummary(report).join("\n"));
  return 0;
}
