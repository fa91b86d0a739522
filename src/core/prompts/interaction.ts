import { cancel, isCancel } from "@clack/prompts";

function unwrapPrompt<T>(value: T | symbol): T {
  if (isCancel(value)) {
    cancel("Module creation canceled.");
    process.exit(1);
  }

  return value;
}

function isInteractiveTerminal(): boolean {
  return Boolean(process.stdin.isTTY) && Boolean(process.stdout.isTTY);
}

export { isInteractiveTerminal, unwrapPrompt };
