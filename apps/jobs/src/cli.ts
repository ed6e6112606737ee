#!/usr/bin/env npx tsx

import ora from "ora";
import chalk from "chalk";
import inquirer from "inquirer";
import Table from "cli-table3";
import boxen from "boxen";
import { formatDuration } from "@sermon-sieve/shared";
import type { ClassificationResult, ClassifiedVideo, VideoRecord } from "@sermon-sieve/shared";
import { loadEnv, readEnvSettings, type EnvSettings } from "./lib/env.js";
import { createClassifierConfig } from "./lib/config.js";
import { loadProfileOverrides, readJsonFile } from "./lib/profile.js";
import { AppError } from "./lib/errors.js";
import {
    ClassificationPipeline,
    parseVideoRecords,
    parseClassifiedVideos,
    summarizeClassifications,
    type ClassificationSummary,
    type ReclassificationReport,
} from "./pipeline.js";

loadEnv();

// ============================================================
// Arguments
// ============================================================

type Command = "classify" | "reclassify";

interface CliArgs {
    command: Command;
    file: string;
    profile?: string;
    json: boolean;
}

const USAGE = `Usage:
  sermon-sieve classify <videos.json> [--profile <profile.json>] [--json]
  sermon-sieve reclassify <classified.json> [--profile <profile.json>] [--json]`;

function parseArgs(argv: string[]): CliArgs | null {
    if (argv.length === 0) return null;

    const [command, ...rest] = argv;
    if (command !== "classify" && command !== "reclassify") {
        throw new AppError(`Unknown command '${command}'\n${USAGE}`, "USAGE");
    }

    let file: string | undefined;
    let profile: string | undefined;
    let json = false;

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (arg === "--json") json = true;
        else if (arg === "--profile") {
            profile = rest[++i];
            if (!profile) throw new AppError(`--profile needs a path\n${USAGE}`, "USAGE");
        } else if (!file) file = arg;
        else throw new AppError(`Unexpected argument '${arg}'\n${USAGE}`, "USAGE");
    }

    if (!file) throw new AppError(`Missing input file\n${USAGE}`, "USAGE");
    return { command, file, profile, json };
}

async function promptArgs(): Promise<CliArgs> {
    const answers = await inquirer.prompt<{ command: Command; file: string; profile: string }>([
        {
            type: "list",
            name: "command",
            message: chalk.cyan.bold("🎯 What do you want to do?"),
            choices: [
                {
                    name: `  ${chalk.green.bold("🔍 Classify")}      ${chalk.gray("→ Sort new videos into preaching / music / unknown")}`,
                    value: "classify",
                },
                {
                    name: `  ${chalk.yellow.bold("♻️  Reclassify")}   ${chalk.gray("→ Re-run stored verdicts and list what changed")}`,
                    value: "reclassify",
                },
            ],
            loop: false,
        },
        {
            type: "input",
            name: "file",
            message: chalk.cyan("📄 Path to the videos JSON file:"),
            validate: (input: string) => input.trim().length > 0 ? true : "Please enter a file path",
        },
        {
            type: "input",
            name: "profile",
            message: chalk.cyan("👤 Speaker profile JSON (leave empty for the default):"),
        },
    ]);

    return {
        command: answers.command,
        file: answers.file.trim(),
        profile: answers.profile.trim() || undefined,
        json: false,
    };
}

// ============================================================
// Display
// ============================================================

function typeBadge(result: Pick<ClassificationResult, "contentType">): string {
    switch (result.contentType) {
        case "PREACHING":
            return chalk.bgGreen.white.bold(" PREACHING ");
        case "MUSIC":
            return chalk.bgMagenta.white(" MUSIC ");
        default:
            return chalk.bgYellow.black(" UNKNOWN ");
    }
}

function confidenceText(score: number): string {
    const pct = `${Math.round(score * 100)}%`;
    if (score >= 0.85) return chalk.green.bold(pct);
    if (score >= 0.5) return chalk.yellow(pct);
    return chalk.gray(pct);
}

function displaySummary(summary: ClassificationSummary) {
    const lines = [
        `${chalk.bold("📊 Classification Complete")}`,
        "",
        `   Total Classified: ${chalk.cyan.bold(summary.total)}`,
        `   ${chalk.green("✅ PREACHING:")} ${chalk.green.bold(summary.preaching)}`,
        `   ${chalk.magenta("🎵 MUSIC:")}     ${chalk.magenta.bold(summary.music)}`,
        `   ${chalk.yellow("❔ UNKNOWN:")}   ${chalk.yellow.bold(summary.unknown)}`,
        "",
        `   ${chalk.red("👀 Needs review:")} ${chalk.red.bold(summary.needsReview)}`,
        chalk.gray(`   High confidence: ${summary.highConfidence}   Low confidence: ${summary.lowConfidence}`),
        "",
        chalk.gray("   --- Storage ---"),
        `   Store:            ${chalk.gray(summary.storage.store)}`,
        `   Music excluded:   ${chalk.gray(summary.storage.music_excluded)}`,
        `   Low confidence:   ${chalk.gray(summary.storage.low_confidence_excluded)}`,
        `   Unknown channel:  ${chalk.gray(summary.storage.unknown_channel_rejected)}`,
    ];

    console.log(boxen(lines.join("\n"), {
        padding: 1,
        margin: { top: 1, bottom: 1, left: 2, right: 2 },
        borderStyle: "double",
        borderColor: summary.needsReview > 0 ? "yellow" : "green",
        title: "Results",
        titleAlignment: "center",
    }));
}

function displayResults(videos: readonly VideoRecord[], results: readonly ClassificationResult[]) {
    const table = new Table({
        head: [
            chalk.cyan.bold("Video"),
            chalk.cyan.bold("Type"),
            chalk.cyan.bold("Conf."),
            chalk.cyan.bold("Length"),
            chalk.cyan.bold("Rule"),
        ],
        colWidths: [40, 14, 8, 10, 28],
        style: {
            head: [],
            border: ["gray"],
        },
    });

    results.forEach((result, i) => {
        const title = videos[i].title || videos[i].videoId;
        table.push([
            (result.needsReview ? "👀 " : "") + title.slice(0, 34),
            typeBadge(result),
            confidenceText(result.confidenceScore),
            formatDuration(videos[i].duration),
            chalk.gray(result.rule),
        ]);
    });

    console.log(table.toString());
    console.log();
}

function displayReclassification(report: ReclassificationReport) {
    console.log(boxen(
        `${chalk.bold("♻️  Reclassification Complete")}\n\n` +
        `   Processed: ${chalk.cyan.bold(report.processed)}\n` +
        `   Changed:   ${chalk.yellow.bold(report.changed.length)}`,
        {
            padding: 1,
            margin: { top: 1, bottom: 1, left: 2, right: 2 },
            borderStyle: "round",
            borderColor: report.changed.length > 0 ? "yellow" : "green",
        }
    ));

    if (report.changed.length === 0) return;

    const table = new Table({
        head: [chalk.cyan.bold("Video"), chalk.cyan.bold("Before"), chalk.cyan.bold("After"), chalk.cyan.bold("Rule")],
        colWidths: [40, 22, 22, 28],
        style: { head: [], border: ["gray"] },
    });

    for (const change of report.changed) {
        table.push([
            (change.title || change.videoId).slice(0, 36),
            `${typeBadge(change.from)} ${confidenceText(change.from.confidenceScore)}`,
            `${typeBadge(change.to)} ${confidenceText(change.to.confidenceScore)}`,
            chalk.gray(change.to.rule),
        ]);
    }

    console.log(table.toString());
    console.log();
}

function toClassifiedVideo(video: VideoRecord, result: ClassificationResult): ClassifiedVideo {
    return {
        ...video,
        classification: {
            contentType: result.contentType,
            confidenceScore: result.confidenceScore,
            needsReview: result.needsReview,
            identityMatched: result.identityMatched,
            channelTrustLevel: result.channelTrustLevel,
            faceVerified: result.faceVerified,
            languageDetected: result.languageDetected,
        },
    };
}

// ============================================================
// Main CLI
// ============================================================

async function buildPipeline(args: CliArgs, env: EnvSettings) {
    const profilePath = args.profile ?? env.speakerProfilePath;
    const profileOverrides = profilePath ? await loadProfileOverrides(profilePath) : {};

    // No face backend ships with the CLI: every video is treated as not face-verified
    const config = createClassifierConfig({ ...profileOverrides, ...env.classifier });

    return new ClassificationPipeline(config, {
        faceVerifyTimeoutMs: env.faceVerifyTimeoutMs,
        concurrency: env.faceVerifyConcurrency,
    });
}

async function runClassify(args: CliArgs, env: EnvSettings) {
    const spinner = args.json ? null : ora(chalk.cyan(`📥 Reading ${args.file}...`)).start();
    let videos: VideoRecord[];
    let results: ClassificationResult[];
    try {
        videos = parseVideoRecords(await readJsonFile(args.file));
        const pipeline = await buildPipeline(args, env);

        if (spinner) spinner.text = chalk.cyan(`🔍 Classifying ${videos.length} videos...`);
        results = await pipeline.classifyBatch(videos);
    } catch (error) {
        spinner?.fail(chalk.red("Classification failed"));
        throw error;
    }

    if (args.json) {
        console.log(JSON.stringify(videos.map((v, i) => toClassifiedVideo(v, results[i])), null, 2));
        return;
    }

    spinner?.succeed(chalk.green(`Classified ${videos.length} videos`));
    displaySummary(summarizeClassifications(results, env.minStorageConfidence));
    displayResults(videos, results);
}

async function runReclassify(args: CliArgs, env: EnvSettings) {
    const spinner = args.json ? null : ora(chalk.cyan(`📥 Reading ${args.file}...`)).start();
    let previous: ClassifiedVideo[];
    let report: ReclassificationReport;
    try {
        previous = parseClassifiedVideos(await readJsonFile(args.file));
        const pipeline = await buildPipeline(args, env);

        if (spinner) spinner.text = chalk.cyan(`♻️  Reclassifying ${previous.length} videos...`);
        report = await pipeline.reclassify(previous);
    } catch (error) {
        spinner?.fail(chalk.red("Reclassification failed"));
        throw error;
    }

    if (args.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
    }

    spinner?.succeed(chalk.green(`Reclassified ${previous.length} videos`));
    displayReclassification(report);
}

async function main() {
    const args = parseArgs(process.argv.slice(2)) ?? await promptArgs();
    const env = readEnvSettings();

    if (args.command === "classify") await runClassify(args, env);
    else await runReclassify(args, env);
}

main().catch(error => {
    if (error instanceof AppError) {
        console.error(chalk.red(`❌ ${error.message}`));
    } else {
        console.error(error);
    }
    process.exitCode = 1;
});
