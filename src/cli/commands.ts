import fs from "node:fs";
import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { loadConfig, saveConfig, getConfigPath } from "../config/loader.js";
import { defaultConfig, type Config } from "../config/schema.js";
import { errorMessage, getWorkspacePath, syncWorkspaceTemplates } from "../utils/helpers.js";
import { setLogLevel } from "../utils/logger.js";
import { MessageBus } from "../bus/queue.js";
import { decodeOrigin, type OutboundMessage } from "../bus/events.js";
import { AgentLoop, DIRECT_CHANNEL } from "../agent/loop.js";
import { SessionManager } from "../session/manager.js";
import { ChannelManager } from "../channels/manager.js";
import { getProviderName, makeProvider } from "../providers/registry.js";
import type { LLMProvider } from "../providers/base.js";
import { MetricsCollector } from "../metrics/collector.js";
import { modelReport, sessionReport, summaryReport, toolReport } from "../metrics/report.js";

const EXIT_COMMANDS = ["exit", "quit", "/exit", "/quit", ":q"];

function metricsFor(config: Config): MetricsCollector {
  return new MetricsCollector(config.metrics.dir, config.metrics.enabled);
}

function buildAgent(config: Config, bus: MessageBus): AgentLoop | null {
  const workspace = getWorkspacePath(config.agents.defaults.workspace);
  let provider: LLMProvider;
  try {
    provider = makeProvider(config);
  } catch (err) {
    console.log(chalk.red(errorMessage(err)));
    process.exitCode = 1;
    return null;
  }
  const d = config.agents.defaults;
  return new AgentLoop({
    bus,
    provider,
    workspace,
    sessionStore: new SessionManager(workspace),
    model: d.model,
    temperature: d.temperature,
    maxTokens: d.maxTokens,
    maxIterations: d.maxToolIterations,
    subagentMaxIterations: d.subagentMaxIterations,
    memoryWindow: d.memoryWindow,
    execConfig: config.tools.exec,
    webSearch: config.tools.web.search,
    restrictToWorkspace: config.tools.restrictToWorkspace,
    metrics: metricsFor(config),
    pollIntervalMs: config.gateway.pollIntervalMs,
  });
}

function printReply(content: string): void {
  console.log(`\n${chalk.cyan("switchyard")}\n${content}\n`);
}

function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  const line = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join("  ");
  console.log(chalk.cyan(line(headers)));
  for (const row of rows) console.log(line(row));
  console.log();
}

const fmt = (n: number) => n.toLocaleString("en-US");

export function positiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError("Expected a positive number.");
  return n;
}

export function positiveInteger(value: string): number {
  const n = positiveNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Expected a positive whole number.");
  return n;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("switchyard")
    .description("switchyard - personal assistant runtime")
    .version("0.1.0");

  program.command("onboard").description("Initialize configuration and workspace").action(async () => {
    const configPath = getConfigPath();
    let config = loadConfig();
    if (fs.existsSync(configPath)) {
      console.log(`Config already exists at ${configPath}`);
      const rl = readline.createInterface({ input, output });
      const ans = (await rl.question("Overwrite? [y/N] ")).trim().toLowerCase();
      rl.close();
      if (ans === "y") {
        config = defaultConfig();
        console.log(`Config reset to defaults at ${configPath}`);
      } else {
        console.log(`Config refreshed at ${configPath} (existing values preserved)`);
      }
    } else {
      console.log(`Created config at ${configPath}`);
    }
    saveConfig(config);
    const workspace = getWorkspacePath(config.agents.defaults.workspace);
    console.log(`Workspace: ${workspace}`);
    for (const name of syncWorkspaceTemplates(workspace)) console.log(`  Created ${name}`);
    console.log(chalk.green("\nswitchyard is ready."));
    console.log(`Add a provider API key to ${configPath}, then run ${chalk.yellow("switchyard agent")} or ${chalk.yellow("switchyard gateway")}.`);
  });

  program
    .command("agent")
    .description("Talk to the agent directly")
    .option("-m, --message <message>", "Message to send to the agent")
    .option("-s, --session <session>", "Session as channel:chat", `${DIRECT_CHANNEL}:direct`)
    .option("--logs", "Show runtime logs while chatting", false)
    .action(async (opts: { message?: string; session: string; logs: boolean }) => {
      const config = loadConfig();
      setLogLevel(opts.logs ? config.logging.level : "silent");
      const bus = new MessageBus(config.gateway.pollIntervalMs);
      const loop = buildAgent(config, bus);
      if (!loop) return;

      const { channel, chatId } = decodeOrigin(opts.session);
      // Interim messages and subagent results arrive through the bus.
      const print = async (msg: OutboundMessage) => {
        if (msg.metadata?._progress) {
          if (!msg.metadata._tool_hint || config.channels.sendToolHints) console.log(chalk.gray(`  ↳ ${msg.content}`));
          return;
        }
        printReply(msg.content);
      };
      bus.subscribeOutbound(channel, print);
      const background = Promise.all([bus.dispatchOutbound(), loop.run()]);
      const shutdown = async () => {
        loop.stop();
        bus.stopDispatch();
        await background;
      };

      if (opts.message) {
        printReply(await loop.processDirect(opts.message, { channel, chatId }));
        await shutdown();
        return;
      }

      console.log("Interactive mode (type exit to quit)");
      const rl = readline.createInterface({ input, output });
      while (true) {
        const line = await rl.question("You: ");
        if (!line.trim()) continue;
        if (EXIT_COMMANDS.includes(line.trim().toLowerCase())) break;
        printReply(await loop.processDirect(line, { channel, chatId }));
      }
      rl.close();
      await shutdown();
    });

  program
    .command("gateway")
    .description("Run the bus, agent loop and enabled channels")
    .option("-v, --verbose", "Debug logging", false)
    .action(async (opts: { verbose: boolean }) => {
      const config = loadConfig();
      setLogLevel(opts.verbose ? "debug" : config.logging.level);
      const bus = new MessageBus(config.gateway.pollIntervalMs);
      const loop = buildAgent(config, bus);
      if (!loop) return;
      const channels = new ChannelManager(config, bus);

      console.log(chalk.cyan(`Starting switchyard gateway (model ${loop.model})...`));
      if (channels.enabledChannels.length) {
        console.log(chalk.green(`Channels enabled: ${channels.enabledChannels.join(", ")}`));
      } else {
        console.log(chalk.yellow("No channels enabled. Gateway will stay idle until channels are configured."));
      }
      console.log(chalk.gray("Gateway running. Press Ctrl+C to stop."));

      process.once("SIGINT", () => {
        console.log("\nShutting down...");
        loop.stop();
        channels.stopAll().catch((err) => console.error(chalk.red(errorMessage(err))));
      });
      await Promise.all([loop.run(), channels.startAll()]);
    });

  program.command("status").description("Show configuration status").action(() => {
    const configPath = getConfigPath();
    const config = loadConfig();
    const workspace = getWorkspacePath(config.agents.defaults.workspace);

    console.log("switchyard status\n");
    console.log(`Config: ${configPath} ${fs.existsSync(configPath) ? "yes" : "no"}`);
    console.log(`Workspace: ${workspace}`);
    console.log(`Model: ${config.agents.defaults.model}`);
    for (const [name, p] of Object.entries(config.providers)) {
      if (p.apiBase && !p.apiKey) console.log(`${name}: ${p.apiBase}`);
      else console.log(`${name}: ${p.apiKey ? "set" : "not set"}`);
    }
    console.log(`Resolved provider: ${getProviderName(config) ?? "none"}`);
    console.log(`Metrics: ${config.metrics.enabled ? metricsFor(config).metricsDir : "disabled"}`);
  });

  const metrics = program.command("metrics").description("View agent metrics");

  metrics.command("summary").option("--hours <hours>", "Look-back window in hours", positiveNumber, 24).action((opts: { hours: number }) => {
    const report = summaryReport(metricsFor(loadConfig()), opts.hours);
    console.log(chalk.bold(`\nMetrics summary (last ${report.periodHours}h)\n`));
    printTable(["Metric", "Value"], [
      ["Sessions", String(report.overview.totalSessions)],
      ["Success rate", `${report.overview.successRate}%`],
      ["Avg iterations/session", String(report.overview.avgIterationsPerSession)],
      ["LLM calls", String(report.llmCalls)],
      ["Prompt tokens", fmt(report.tokens.totalPrompt)],
      ["Completion tokens", fmt(report.tokens.totalCompletion)],
      ["Total tokens", fmt(report.tokens.total)],
      ["Tokens/session", fmt(report.tokens.avgPerSession)],
      ["Tokens/success", fmt(report.tokens.perSuccess)],
      ["Tool calls", String(report.tools.totalCalls)],
      ["Tool success rate", `${report.tools.successRate}%`],
    ]);
  });

  metrics.command("tools").option("--hours <hours>", "Look-back window in hours", positiveNumber, 24).action((opts: { hours: number }) => {
    const rows = toolReport(metricsFor(loadConfig()), opts.hours);
    if (!rows.length) return console.log(chalk.yellow("No tool events recorded yet."));
    printTable(["Tool", "Calls", "Success", "Avg latency", "Avg in", "Avg out", "Top errors"], rows.map((r) => [
      r.tool,
      String(r.calls),
      `${r.successRate}%`,
      `${r.avgLatencyMs}ms`,
      String(r.avgInputSize),
      String(r.avgOutputSize),
      Object.entries(r.topErrors).map(([k, v]) => `${k.split("\n", 1)[0]}(${v})`).join(", ").slice(0, 60) || "-",
    ]));
  });

  metrics.command("sessions").option("-n, --last <n>", "Number of recent cycles", positiveInteger, 20).action((opts: { last: number }) => {
    const rows = sessionReport(metricsFor(loadConfig()), opts.last);
    if (!rows.length) return console.log(chalk.yellow("No sessions recorded yet."));
    printTable(["Session", "Time", "OK", "Iter", "Tools", "Tokens", "Duration", "Model"], rows.map((r) => [
      r.sessionId.slice(0, 30),
      r.startedAt.slice(0, 16),
      r.success ? chalk.green("✓") : chalk.red("✗"),
      String(r.iterations),
      String(r.toolCalls),
      fmt(r.totalTokens),
      `${r.durationMs}ms`,
      r.model,
    ]));
  });

  metrics.command("models").option("--hours <hours>", "Look-back window in hours", positiveNumber, 168).action((opts: { hours: number }) => {
    const rows = modelReport(metricsFor(loadConfig()), opts.hours);
    if (!rows.length) return console.log(chalk.yellow("No session data recorded yet."));
    printTable(["Model", "Sessions", "Success", "Total tokens", "Tokens/session", "Tokens/success"], rows.map((r) => [
      r.model,
      String(r.sessions),
      `${r.successRate}%`,
      fmt(r.totalTokens),
      fmt(r.tokensPerSession),
      fmt(r.tokensPerSuccess),
    ]));
  });

  metrics.command("reset").option("-y, --yes", "Skip confirmation", false).action(async (opts: { yes: boolean }) => {
    const collector = metricsFor(loadConfig());
    if (!opts.yes) {
      const rl = readline.createInterface({ input, output });
      const ans = (await rl.question(`Delete all metrics in ${collector.metricsDir}? [y/N] `)).trim().toLowerCase();
      rl.close();
      if (ans !== "y") return;
    }
    console.log(collector.reset() ? chalk.green("Metrics data cleared") : chalk.gray("No metrics data found"));
  });

  return program;
}
