#!/usr/bin/env node
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { Command, InvalidArgumentError } from "commander";

import type { TargetLanguage } from "@pali-corpus/corpus-types";

import { env } from "./config/env";
import {
  loadPipelineConfiguration,
  type PipelineConfiguration,
} from "./config/pipelineConfiguration";
import { closePool, getPool } from "./db";
import { CorpusSink, ensureSchema } from "./db/corpusSink";
import { ConfigurationError, PipelineError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import { getOpenAIClient } from "./services/openaiClient";
import { FileCorpusRepository, type CorpusChanges } from "./services/corpus/corpusStore";
import { isTargetLanguage } from "./services/corpus/corpusTree";
import {
  applyExchangeRecords,
  exchangeFileName,
  exportBatches,
  parseExchangeFile,
  type ApplyStatus,
} from "./services/translation/batchExchange";
import { FileCheckpointStore } from "./services/translation/checkpointStore";
import { extract, summarizeCoverage } from "./services/translation/extractor";
import { repairCorpusJoiners } from "./services/translation/joinerRepair";
import { OpenAITranslationProvider } from "./services/translation/providers/openaiProvider";
import { TranslationSessionDriver } from "./services/translation/sessionDriver";

const log = createLogger("cli");

export const DEFAULT_CHECKPOINT_FILE = ".translation.checkpoint.json";

export function parseLanguages(value: string): TargetLanguage[] {
  const languages = value
    .split(",")
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean);
  const invalid = languages.filter((language) => !isTargetLanguage(language));
  if (languages.length === 0 || invalid.length > 0) {
    throw new InvalidArgumentError(
      `Expected a comma-separated list of english, sinhala; got "${value}".`,
    );
  }
  return Array.from(new Set(languages.filter(isTargetLanguage)));
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer; got "${value}".`);
  }
  return parsed;
}

const print = (line = "") => {
  process.stdout.write(`${line}\n`);
};

const mergeChanges = (
  into: { chapterIds: Set<string>; manifest: boolean },
  changes: CorpusChanges,
) => {
  for (const id of changes.chapterIds) into.chapterIds.add(id);
  if (changes.manifest) into.manifest = true;
};

type CommonOptions = {
  config?: string;
  languages?: TargetLanguage[];
};

function resolveConfig(options: CommonOptions): PipelineConfiguration {
  const config = loadPipelineConfiguration(options.config ?? env.PIPELINE_CONFIG_PATH);
  return options.languages ? { ...config, requiredLanguages: options.languages } : config;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("corpus-translate")
    .description("Incremental translation pipeline for a Pali corpus directory")
    .option("-c, --config <path>", "pipeline configuration JSON")
    .option("-l, --languages <list>", "required target languages", parseLanguages);

  const common = (): CommonOptions => program.opts<CommonOptions>();

  program
    .command("status")
    .description("Show translation coverage")
    .argument("<dir>", "corpus directory")
    .action(async (dir: string) => {
      const config = resolveConfig(common());
      const tree = await new FileCorpusRepository(dir).load();
      const summary = summarizeCoverage(tree, config.requiredLanguages);
      print(`Collection:        ${tree.id}`);
      print(`Field occurrences: ${summary.occurrences}`);
      print(`Distinct sources:  ${summary.distinctSources}`);
      print(`Pending units:     ${summary.pendingUnits}`);
      for (const [language, coverage] of Object.entries(summary.languages)) {
        print(
          `  ${language.padEnd(8)} ${coverage.translated} translated, ${coverage.missing} missing`,
        );
      }
    });

  program
    .command("extract")
    .description("List units that still need a translation")
    .argument("<dir>", "corpus directory")
    .option("-o, --out <file>", "write the units to a JSON file instead of stdout")
    .action(async (dir: string, options: { out?: string }) => {
      const config = resolveConfig(common());
      const units = extract(await new FileCorpusRepository(dir).load(), config.requiredLanguages);
      const json = `${JSON.stringify(units, null, 2)}\n`;
      if (options.out) {
        await writeFile(options.out, json, "utf8");
        log.info({ units: units.length, out: options.out }, "[CLI] Extraction written");
      } else {
        process.stdout.write(json);
      }
    });

  program
    .command("export")
    .description("Write missing units as batch exchange files")
    .argument("<dir>", "corpus directory")
    .requiredOption("-o, --out <dir>", "output directory")
    .option("-b, --batch-size <n>", "units per file", parsePositiveInt)
    .action(async (dir: string, options: { out: string; batchSize?: number }) => {
      const config = resolveConfig(common());
      const units = extract(await new FileCorpusRepository(dir).load(), config.requiredLanguages);
      const files = exportBatches(units, options.batchSize ?? config.batching.maxBatchSize);
      await mkdir(options.out, { recursive: true });
      for (const file of files) {
        await writeFile(
          path.join(options.out, exchangeFileName(file)),
          `${JSON.stringify(file, null, 2)}\n`,
          "utf8",
        );
      }
      print(`Wrote ${files.length} file(s) covering ${units.length} unit(s) to ${options.out}`);
    });

  program
    .command("apply")
    .description("Merge filled-in exchange files into the corpus")
    .argument("<dir>", "corpus directory")
    .argument("<files...>", "exchange files")
    .option("-f, --force", "overwrite differing existing translations")
    .action(async (dir: string, files: string[], options: { force?: boolean }) => {
      const config = resolveConfig(common());
      const repository = new FileCorpusRepository(dir);
      const tree = await repository.load();
      const changes = { chapterIds: new Set<string>(), manifest: false };
      const totals = new Map<ApplyStatus, number>();

      for (const file of files) {
        const exchange = parseExchangeFile(JSON.parse(await readFile(file, "utf8")), file);
        const result = applyExchangeRecords(tree, exchange.records, {
          force: options.force,
          sanitizer: config.sanitizer,
        });
        mergeChanges(changes, result.changes);
        for (const outcome of result.outcomes) {
          totals.set(outcome.status, (totals.get(outcome.status) ?? 0) + 1);
          if (outcome.status !== "merged" && outcome.status !== "unchanged") {
            log.warn(
              { file, language: outcome.language, status: outcome.status, message: outcome.message },
              "[CLI] Record not applied",
            );
          }
        }
      }

      await repository.save(tree, changes);
      for (const [status, count] of totals) {
        print(`${status.padEnd(16)} ${count}`);
      }
    });

  program
    .command("translate")
    .description("Run a resumable translation session against the provider")
    .argument("<dir>", "corpus directory")
    .option("--checkpoint <file>", "checkpoint file (default: <dir>/.translation.checkpoint.json)")
    .option("--resume-after <key>", "skip every unit at or before this location key")
    .option("-m, --model <name>", "provider model", env.TRANSLATION_MODEL)
    .action(
      async (dir: string, options: { checkpoint?: string; resumeAfter?: string; model: string }) => {
        const config = resolveConfig(common());
        const driver = new TranslationSessionDriver({
          repository: new FileCorpusRepository(dir),
          checkpoints: new FileCheckpointStore(
            options.checkpoint ?? path.join(dir, DEFAULT_CHECKPOINT_FILE),
          ),
          provider: new OpenAITranslationProvider({
            client: getOpenAIClient(),
            model: options.model,
            timeoutMs: config.provider.timeoutMs,
          }),
          config,
          resumeAfter: options.resumeAfter ?? null,
        });

        const onSignal = () => {
          log.warn("[CLI] Stop requested, finishing the current unit");
          if (driver.state === "RUNNING") driver.requestStop();
        };
        process.once("SIGINT", onSignal);
        try {
          const report = await driver.run();
          print(JSON.stringify(report, null, 2));
          if (report.state !== "COMPLETE") process.exitCode = 2;
        } finally {
          process.off("SIGINT", onSignal);
        }
      },
    );

  program
    .command("normalize")
    .description("Repair zero-width joiners in stored translations")
    .argument("<dir>", "corpus directory")
    .action(async (dir: string) => {
      const repository = new FileCorpusRepository(dir);
      const tree = await repository.load();
      const report = repairCorpusJoiners(tree);
      if (report.repaired > 0) {
        await repository.save(tree, report.changes);
      }
      print(`Repaired ${report.repaired} value(s) at ${report.locations.length} location(s)`);
    });

  program
    .command("sink")
    .description("Bulk-load the corpus into Postgres")
    .argument("<dir>", "corpus directory")
    .option("--ensure-schema", "apply server/db/schema.sql first")
    .action(async (dir: string, options: { ensureSchema?: boolean }) => {
      const tree = await new FileCorpusRepository(dir).load();
      try {
        if (options.ensureSchema) {
          await ensureSchema(getPool());
        }
        const report = await new CorpusSink(getPool()).load(tree);
        print(JSON.stringify(report, null, 2));
      } finally {
        await closePool();
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      const code = error instanceof PipelineError ? error.code : "unexpected";
      log.error({ code, err: errorMessage(error) }, "[CLI] Command failed");
      process.stderr.write(`${errorMessage(error)}\n`);
      process.exitCode = error instanceof ConfigurationError ? 78 : 1;
    });
}
