import fs from "fs";
import readline from "readline";
import { getFlags } from "../context/flags";
import { describeError } from "../errors";
import { logWarn } from "./log";

let queuedAnswers: string[] | null = null;
let rl: readline.Interface | null = null;

function nonInteractive(): boolean {
  return getFlags().nonInteractive || process.env.RELEASE_PREP_NON_INTERACTIVE === "1";
}

function shouldUseQueuedAnswers(): boolean {
  if (process.env.RELEASE_PREP_STDIN === "1") {
    return true;
  }
  return !process.stdin.isTTY && !process.stdout.isTTY;
}

function getQueuedAnswers(): string[] {
  if (queuedAnswers) {
    return queuedAnswers;
  }
  try {
    const raw = fs.readFileSync(0, "utf-8");
    queuedAnswers = raw.split(/\r?\n/).filter((line) => line.length > 0);
  } catch (error) {
    logWarn(`Could not read answers from stdin: ${describeError(error)}`);
    queuedAnswers = [];
  }
  return queuedAnswers;
}

function getInterface(): readline.Interface {
  if (rl) {
    return rl;
  }
  rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });
  return rl;
}

export function closePrompt(): void {
  if (!rl) {
    return;
  }
  rl.close();
  rl = null;
}

process.on("exit", () => closePrompt());

export function ask(question: string): Promise<string> {
  if (nonInteractive()) {
    return Promise.resolve("");
  }
  if (shouldUseQueuedAnswers()) {
    const answer = getQueuedAnswers().shift() ?? "";
    return Promise.resolve(answer.trim());
  }
  return new Promise((resolve) => {
    getInterface().question(question, (answer) => {
      resolve(answer.trim());
    });
  });
}

export async function confirm(question: string): Promise<boolean> {
  if (getFlags().approve || nonInteractive()) {
    return true;
  }
  const response = await ask(question);
  const normalized = response.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}
