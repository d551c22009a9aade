import { ProgressReporter } from "./types";

export const TOTAL_STAGES = 6;

export function formatProgress(stage: number, message: string): string {
  return `[${stage}/${TOTAL_STAGES}] ${message}`;
}

export function createConsoleProgress(write: (line: string) => void = (line) => console.log(line)): ProgressReporter {
  return (stage, message) => write(formatProgress(stage, message));
}

export const silentProgress: ProgressReporter = () => undefined;
