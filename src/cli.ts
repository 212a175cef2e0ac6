import { homedir } from "node:os";
import { resolve } from "node:path";

import { log } from "@clack/prompts";
import { Command } from "commander";

import { runGenerate } from "./commands/generate.js";
import { runStatus } from "./commands/status.js";
import { normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import type { GenerateCommandOptions, StatusCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;
const LOTUS_ART = ["  _(\\)_ ", " (_ . _)"];

const ANSI = {
  reset: "\u001B[0m",
  bold: "\u001B[1m",
  borderGray: "\u001B[38;5;245m",
  mutedGray: "\u001B[38;5;250m",
  white: "\u001B[97m",
  saffron: "\u001B[38;5;214m"
} as const;

const COLOR_ENABLED = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";

function paint(text: string, ...codes: string[]): string {
  if (!COLOR_ENABLED || text.length === 0) return text;
  return `${codes.join("")}${text}${ANSI.reset}`;
}

function compactPath(path: string): string {
  const home = homedir();
  return path.startsWith(home) ? `~${path.slice(home.length)}` : path;
}

function ellipsize(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return "";
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 1) return "…";
  return `…${text.slice(text.length - maxWidth + 1)}`;
}

function renderBrandHeader(pathArg: string | undefined): void {
  const terminalWidth = process.stdout.columns ?? 80;
  const innerWidth = Math.min(64, Math.max(36, terminalWidth - 4));
  const artWidth = Math.max(...LOTUS_ART.map((line) => line.length));
  const leftWidth = innerWidth - artWidth - 2;
  const output = compactPath(resolve(process.cwd(), pathArg ?? "."));

  const rows: Array<{ left: string; style: string[]; art: string }> = [
    { left: "karma-journal", style: [ANSI.bold, ANSI.saffron], art: LOTUS_ART[0] ?? "" },
    { left: "Karma Yoga field-visit journal drafts", style: [ANSI.white], art: LOTUS_ART[1] ?? "" },
    { left: `version:   v${CLI_VERSION}`, style: [ANSI.mutedGray], art: "" },
    { left: `output:    ${output}`, style: [ANSI.mutedGray], art: "" }
  ];

  const vertical = paint("│", ANSI.borderGray);
  console.log(paint(`╭${"─".repeat(innerWidth + 2)}╮`, ANSI.borderGray));
  for (const row of rows) {
    const left = ellipsize(row.left, leftWidth).padEnd(leftWidth, " ");
    const art = row.art.padEnd(artWidth, " ");
    console.log(`${vertical} ${paint(left, ...row.style)}  ${paint(art, ANSI.saffron)} ${vertical}`);
  }
  console.log(paint(`╰${"─".repeat(innerWidth + 2)}╯`, ANSI.borderGray));
  console.log("");
}

function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

program
  .name("karma-journal")
  .description("Draft a ~500-word Karma Yoga journal report with Gemini and save it as a text file.")
  .version(CLI_VERSION);

program
  .command("generate")
  .description("Collect field-visit details, generate the journal report and save it.")
  .argument("[output-dir]", "Directory for the report file (defaults to current working directory)")
  .option("--project <name>", "Karma Yoga project name")
  .option("--date <yyyy-mm-dd>", "Date of the field visit")
  .option("--objectives <text>", "Objectives, goals and purpose of the visit")
  .option("--question <text>", "Verifying authority question (repeatable)", collectValues)
  .option("--no-default-questions", "Do not include the four standard field-visit questions")
  .option("--activities <text>", "What you have done so far")
  .option("--media <path>", "Photo or video from the visit (repeatable; never sent to the model)", collectValues)
  .option("--model <model>", "Gemini model id")
  .option("--timeout-sec <seconds>", "Timeout for the model request in seconds (default: 60)")
  .option("--format <format>", "text | json", "text")
  .option("--stdout-only", "Print the report without saving a file", false)
  .option("--force", "Overwrite an existing report file", false)
  .option("-y, --yes", "Use flags only and skip interactive prompts")
  .action(async (pathArg: string | undefined, rawOptions: GenerateCommandOptions) => {
    if (rawOptions.format !== "json") {
      renderBrandHeader(pathArg);
    }
    await runGenerate(pathArg, rawOptions);
  });

program
  .command("status")
  .description("Show the effective model configuration and whether an API key is set.")
  .option("--model <model>", "Gemini model id")
  .option("--timeout-sec <seconds>", "Timeout for the model request in seconds")
  .option("--format <format>", "text | json", "text")
  .action((rawOptions: StatusCommandOptions) => {
    runStatus(rawOptions, CLI_VERSION);
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (rawError) {
    const error = normalizeError(rawError);
    if (resolveOutputFormatFromArgv(process.argv) === "json") {
      console.log(JSON.stringify(toJsonErrorPayload(error), null, 2));
    } else {
      log.error(error.message);
      if (error.retryable) {
        log.info("This is usually temporary. Run the command again in a moment.");
      }
    }
    process.exitCode = error.exitCode;
  }
}

void main();
