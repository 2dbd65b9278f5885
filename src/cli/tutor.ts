#!/usr/bin/env node
/**
 * Textbook tutor CLI
 *
 * Usage:
 *   tutor build-index ./books/*.pdf --out ./kb
 *   tutor ask --student s1 "explain conditional probability"
 *   tutor quiz --student s1 --topic matrices --difficulty hard
 *   tutor progress --student s1
 *
 * Results are printed to stdout as JSON. Failures go to stderr and set exit code 1.
 */

import path from "path";

import { Command, Option } from "commander";

import { loadTutorConfig, TutorConfig } from "../lib/config";
import { buildCorpusIndex } from "../lib/parsing/kb-builder";
import { TutorPipelineError, toErrorMessage } from "../lib/study/errors";
import { QuizRequestDifficulty, TutorService } from "../lib/study/tutor";
import { Difficulty, Embedder } from "../lib/study/types";
import { createEmbedder, createTutorService } from "../lib/tutor-runtime";

export type TutorCliRuntime = {
  config: TutorConfig;
  tutor: () => TutorService;
  embedder: () => Embedder;
  write: (line: string) => void;
  writeError: (line: string) => void;
};

const DIFFICULTY_CHOICES = ["auto", "easy", "medium", "hard"];

function parseDifficulty(value: string): QuizRequestDifficulty {
  return value === "easy" || value === "medium" || value === "hard" ? value : "auto";
}

function parseAnswerDifficulty(value: string): Difficulty {
  return value === "easy" || value === "hard" ? value : "medium";
}

function parseLimit(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`--limit expects a positive integer, got '${value}'`);
  }
  return parsed;
}

export function createDefaultRuntime(config = loadTutorConfig()): TutorCliRuntime {
  let tutor: TutorService | undefined;
  return {
    config,
    tutor: () => {
      tutor ??= createTutorService(config);
      return tutor;
    },
    embedder: () => createEmbedder(config),
    write: (line) => process.stdout.write(`${line}\n`),
    writeError: (line) => process.stderr.write(`${line}\n`),
  };
}

export function createTutorProgram(runtime: TutorCliRuntime): Command {
  const program = new Command();

  const run = async (task: () => Promise<unknown>) => {
    try {
      runtime.write(JSON.stringify(await task(), null, 2));
    } catch (error) {
      const code = error instanceof TutorPipelineError ? error.code : undefined;
      runtime.writeError(JSON.stringify({ error: toErrorMessage(error), code }));
      process.exitCode = 1;
    }
  };

  program.name("tutor").description("Textbook-grounded tutoring from the command line").version("0.1.0");

  program
    .command("build-index")
    .description("Extract, embed and index textbook PDFs")
    .argument("<pdfs...>", "PDF files; each file name becomes the chapter label")
    .option("-o, --out <dir>", "Output directory for the corpus artifacts", runtime.config.kbDir)
    .action(async (pdfs: string[], options: { out: string }) => {
      await run(() =>
        buildCorpusIndex({
          pdfPaths: pdfs.map((pdf) => path.resolve(pdf)),
          outDir: path.resolve(options.out),
          embedder: runtime.embedder(),
        }),
      );
    });

  program
    .command("ask")
    .description("Ask a question; the planner chooses between an explanation and a quiz")
    .requiredOption("-s, --student <id>", "Student id")
    .argument("<query...>", "Question text")
    .action(async (query: string[], options: { student: string }) => {
      await run(() => runtime.tutor().ask(options.student, query.join(" ")));
    });

  program
    .command("quiz")
    .description("Generate multiple-choice questions on a topic")
    .requiredOption("-s, --student <id>", "Student id")
    .requiredOption("-t, --topic <topic>", "Topic to quiz on")
    .addOption(new Option("-d, --difficulty <level>", "Difficulty").choices(DIFFICULTY_CHOICES).default("auto"))
    .action(async (options: { student: string; topic: string; difficulty: string }) => {
      await run(() => runtime.tutor().quiz(options.student, options.topic, parseDifficulty(options.difficulty)));
    });

  program
    .command("answer")
    .description("Record an answer to a quiz question")
    .requiredOption("-s, --student <id>", "Student id")
    .requiredOption("-t, --topic <topic>", "Topic of the question")
    .requiredOption("-q, --question <text>", "Question text")
    .requiredOption("--selected <option>", "Option the student picked")
    .requiredOption("--correct <option>", "Correct option")
    .addOption(
      new Option("-d, --difficulty <level>", "Difficulty").choices(["easy", "medium", "hard"]).default("medium"),
    )
    .action(
      async (options: {
        student: string;
        topic: string;
        question: string;
        selected: string;
        correct: string;
        difficulty: string;
      }) => {
        await run(() =>
          runtime.tutor().submitAnswer({
            studentId: options.student,
            topic: options.topic,
            question: options.question,
            selectedOption: options.selected,
            correctOption: options.correct,
            difficulty: parseAnswerDifficulty(options.difficulty),
          }),
        );
      },
    );

  program
    .command("register")
    .description("Register a student")
    .requiredOption("-s, --student <id>", "Student id")
    .option("-n, --name <name>", "Display name", "")
    .action(async (options: { student: string; name: string }) => {
      await run(() => runtime.tutor().registerStudent(options.student, options.name));
    });

  program
    .command("progress")
    .description("Per-topic accuracy and strength for a student")
    .requiredOption("-s, --student <id>", "Student id")
    .action(async (options: { student: string }) => {
      await run(() => runtime.tutor().progress(options.student));
    });

  program
    .command("interactions")
    .description("Most recent logged interactions for a student")
    .requiredOption("-s, --student <id>", "Student id")
    .option("-l, --limit <n>", "Maximum number of interactions", "100")
    .action(async (options: { student: string; limit: string }) => {
      await run(async () => ({
        studentId: options.student,
        interactions: await runtime.tutor().interactions(options.student, parseLimit(options.limit)),
      }));
    });

  return program;
}

if (require.main === module) {
  createTutorProgram(createDefaultRuntime())
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error("[cli] failed", { message: toErrorMessage(error) });
      process.exitCode = 1;
    });
}
