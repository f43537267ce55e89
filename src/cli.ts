#!/usr/bin/env node
import * as fs from "fs";
import { fileURLToPath } from "url";
import { Command, CommanderError } from "commander";
import {
    convertDataset,
    createLogger,
    isMissingDataDirectory,
    loadOptionsFile,
    Parrec2NiiConverter,
    ParRecError,
    resolveOptions,
    CONVERSION_SOFTWARE_VERSION,
    type ConversionReport,
    type ImageConverter,
    type Logger,
    type PartialConversionOptions,
} from "./index.js";

export const EXIT_SUCCESS = 0;
export const EXIT_NO_INPUT = 1;
export const EXIT_PARTIAL_FAILURE = 2;

interface CliOptions {
    dataDir: string;
    config?: string;
    session?: string;
    verbose: boolean;
}

export interface CliDependencies {
    /** Replaces the parrec2nii invocation */
    converter?: ImageConverter;
    logger?: Logger;
}

function printExpectedLayout(logger: Logger, dataDir: string) {
    logger.error(`Data directory '${dataDir}' not found. Please ensure your data is organized as:
${dataDir}/
├── [SubjectID]/
│   ├── XMLPARREC/
│   │   ├── *.PAR
│   │   ├── *.REC
│   │   ├── *.XML
│   │   └── *.V41
│   └── NIfTI_BIDS/ (will be created)`);
}

export function exitCodeFor(report: ConversionReport): number {
    if (report.failed > 0) return EXIT_PARTIAL_FAILURE;
    if (report.converted === 0) return EXIT_NO_INPUT;
    return EXIT_SUCCESS;
}

function printSummary(logger: Logger, report: ConversionReport) {
    logger.info(
        `\nBIDS conversion finished for ${report.subjects.length} subject(s): ` +
            `${report.converted} converted, ${report.failed} failed, ${report.skipped} skipped`,
    );
    for (const subject of report.subjects) {
        if (subject.error) {
            logger.info(`  FAILED ${subject.subjectId}: ${subject.error.message}`);
        }
        for (const outcome of subject.outcomes) {
            if (outcome.status === "failed") {
                logger.info(`  FAILED ${subject.subjectId}: ${outcome.parPath}`);
            }
        }
    }
}

async function convert(subjects: string[], cli: CliOptions, deps: CliDependencies): Promise<number> {
    const logger = deps.logger ?? createLogger(cli.verbose ? "debug" : "info");

    let overrides: PartialConversionOptions = {};
    try {
        if (cli.config) {
            overrides = loadOptionsFile(cli.config);
        }
        if (cli.session) {
            overrides = { ...overrides, includeSessionEntity: true, sessionLabel: cli.session };
        }
        const options = resolveOptions(overrides);
        const converter = deps.converter ?? new Parrec2NiiConverter({ command: options.converterCommand });

        const report = await convertDataset(
            { dataDir: cli.dataDir, subjects },
            { options, converter, logger },
        );
        printSummary(logger, report);
        return exitCodeFor(report);
    } catch (e) {
        if (isMissingDataDirectory(e)) {
            printExpectedLayout(logger, cli.dataDir);
            return EXIT_NO_INPUT;
        }
        if (e instanceof ParRecError) {
            logger.error(`Error: ${e.message}`);
            return EXIT_NO_INPUT;
        }
        throw e;
    }
}

/**
 * Parse `argv` (without the node and script entries) and run the conversion
 */
export async function run(argv: string[], deps: CliDependencies = {}): Promise<number> {
    let exitCode = EXIT_SUCCESS;

    const program = new Command()
        .name("parrec-bids")
        .description("Convert Philips PAR/REC files to BIDS-compliant NIfTI format")
        .version(CONVERSION_SOFTWARE_VERSION)
        .argument("[subjects...]", "subject IDs to convert (e.g. VA003 VA004); all subjects when omitted")
        .option("-d, --data-dir <dir>", "base data directory", "Data")
        .option("-c, --config <file>", "JSON file with conversion options")
        .option("--session <label>", "add a ses-<label> entity to every output name")
        .option("-v, --verbose", "verbose output", false)
        .addHelpText(
            "after",
            `
Examples:
  $ parrec-bids                 # Convert all subjects
  $ parrec-bids VA003           # Convert specific subject
  $ parrec-bids VA003 VA004     # Convert multiple subjects`,
        )
        .exitOverride()
        .action(async (subjects: string[], cli: CliOptions) => {
            exitCode = await convert(subjects, cli, deps);
        });

    try {
        await program.parseAsync(argv, { from: "user" });
    } catch (e) {
        if (e instanceof CommanderError) {
            return e.exitCode;
        }
        throw e;
    }
    return exitCode;
}

function isMain(): boolean {
    const script = process.argv[1];
    return script !== undefined && fs.existsSync(script) && fs.realpathSync(script) === fileURLToPath(import.meta.url);
}

// Run if main
if (isMain()) {
    run(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((err) => {
            console.error(err);
            process.exit(1);
        });
}
