import type { CommandContext } from "../context.js";

export async function runPingCommand(_args: string[], ctx: CommandContext): Promise<void> {
  const reachable = await ctx.engine.ping(ctx.settings, ctx.signal);
  if (reachable) {
    process.stdout.write("reachable\n");
    return;
  }
  process.stdout.write("unreachable\n");
  process.stderr.write(`Cannot reach ${ctx.settings.baseUrl}. Start it with: ollama serve\n`);
  process.exitCode = 1;
}
