// mod-host/commands.ts

export type HostCommand =
  | { kind: "drop"; tier: number }
  | { kind: "daily" }
  | { kind: "loot" }
  | { kind: "status" }
  | { kind: "inbox" }
  | { kind: "day"; count: number }
  | { kind: "sleep" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "unknown"; input: string; hint?: string };

export const HELP_LINES = [
  "drop <tier>   ask the supplier for a drop",
  "daily         force today's refresh drop",
  "loot          show this week's loot table",
  "status        show scheduler state",
  "inbox         read new supplier messages",
  "day [n]       skip ahead n in-game days (default 1)",
  "sleep         go to sleep (clears the active drop)",
  "quit          stop the host",
];

export function parseCommand(line: string): HostCommand {
  const [verb = "", ...args] = line.trim().split(/\s+/);

  switch (verb.toLowerCase()) {
    case "drop": {
      const tier = Number(args[0]);
      if (!Number.isInteger(tier)) {
        return { kind: "unknown", input: line, hint: "usage: drop <tier>" };
      }
      return { kind: "drop", tier };
    }
    case "day": {
      const count = args[0] === undefined ? 1 : Number(args[0]);
      if (!Number.isInteger(count) || count < 1) {
        return { kind: "unknown", input: line, hint: "usage: day [n]" };
      }
      return { kind: "day", count };
    }
    case "daily":
      return { kind: "daily" };
    case "loot":
      return { kind: "loot" };
    case "status":
      return { kind: "status" };
    case "inbox":
      return { kind: "inbox" };
    case "sleep":
      return { kind: "sleep" };
    case "help":
    case "?":
      return { kind: "help" };
    case "quit":
    case "exit":
      return { kind: "quit" };
    default:
      return { kind: "unknown", input: line };
  }
}
