export const COMMANDS = ["ingest", "ask", "chat", "ping"] as const;

export type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error("Usage: docent <ingest|ask|chat|ping> [...]");
  }
  return { command, args: rest };
}
