/**
 * cli.ts - Command tree for the plumbline CLI
 *
 * Three command groups:
 *
 *   plumbline checks <run|fix> [checks...] [--agents-dir <path> | --notebooks-dir <path>]
 *     Runs Black, isort and Flake8 (through nbqa for notebooks).
 *
 *   plumbline logs <latest|error|resource|range|dataflow-job|dataproc-job|dataproc-cluster|cpu>
 *     Runs one monitoring tool directly and prints its report.
 *
 *   plumbline ask <question>
 *     Sends the question to the monitoring agent and streams its work.
 *
 * buildProgram() takes its collaborators (executor, environment, monitoring
 * clients, output) as dependencies so tests can drive the whole command tree
 * in-process. runCli() turns every outcome into an exit code; index.ts
 * assigns it to process.exitCode.
 */

import { Argument, Command, CommanderError, InvalidArgumentError } from "commander";
import { HumanMessage } from "@langchain/core/messages";
import type { z } from "zod";
import {
  CHECK_ACTIONS,
  CheckUsageError,
  defaultLayout,
  ensureTools,
  REQUIRED_TOOLS,
  resolveChecks,
  resolveTargets,
  runChecks,
  SUCCESS_MESSAGE,
  type CheckAction,
} from "./checks";
import {
  defaultMonitoringContext,
  getCpuUtilization,
  getCpuUtilizationSchema,
  getDataflowJobLogs,
  getDataflowJobLogsSchema,
  getDataprocClusterLogs,
  getDataprocClusterLogsByUuid,
  getDataprocClusterLogsByUuidSchema,
  getDataprocClusterLogsSchema,
  getDataprocJobLogs,
  getDataprocJobLogsSchema,
  getLatestError,
  getLatestErrorSchema,
  getLatestLogs,
  getLatestLogsSchema,
  getLogs,
  getLogsSchema,
  getResourceLogs,
  getResourceLogsSchema,
  type MonitoringContext,
  type ToolResult,
} from "./tools/core";
import { getMonitorAgent, truncate } from "./agent/monitor";
import { withAgentTracing, setTraceOutput } from "./tracing/context-bridge";
import type { CommandExecutor } from "./utils/command";

export const VERSION = "0.1.0";

/** Where the CLI writes; console by default */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDependencies {
  executor?: CommandExecutor;
  env?: NodeJS.ProcessEnv;
  monitoring?: MonitoringContext;
  io?: CliIO;
  /** Replaces the streaming agent run; returns the exit code */
  ask?: (question: string, io: CliIO) => Promise<number>;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

interface CheckCommandOptions {
  agentsDir?: string;
  notebooksDir?: string;
  skipInstall?: boolean;
}

interface ProjectOptions {
  project?: string;
}

interface SeverityOptions extends ProjectOptions {
  severity?: string;
}

interface LimitOptions extends ProjectOptions {
  limit?: number;
}

function parseLimit(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function parseAction(value: string): CheckAction {
  const action = CHECK_ACTIONS.find((candidate) => candidate === value);
  if (!action) {
    throw new CheckUsageError(
      `Unknown action '${value}'. Valid actions: ${CHECK_ACTIONS.join(", ")}.`
    );
  }
  return action;
}

/**
 * Builds the command tree.
 *
 * Action handlers report their exit code through `setExitCode`; thrown
 * errors are mapped by runCli().
 */
export function buildProgram(
  deps: CliDependencies = {},
  setExitCode: (code: number) => void = (code) => {
    process.exitCode = code;
  }
): Command {
  const io = deps.io ?? consoleIO;
  const env = deps.env ?? process.env;
  const monitoring = deps.monitoring ?? defaultMonitoringContext;
  const ask = deps.ask ?? streamAnswer;

  const program = new Command();
  program
    .name("plumbline")
    .description(
      "Python code checks and Google Cloud monitoring tools for data engineering agents"
    )
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  // -------------------------------------------------------------------------
  // checks: Black, isort and Flake8 over ./agents and ./notebooks
  // -------------------------------------------------------------------------

  program
    .command("checks")
    .description("Run Python formatters and linters over the agents and notebooks trees")
    .addArgument(
      new Argument("<action>", "run (verify only) or fix (format in place)").choices(
        CHECK_ACTIONS
      )
    )
    .argument("[checks...]", "all, black, isort, lint or flake8 (default: all)")
    .option("--agents-dir <path>", "check only this .py tree")
    .option("--notebooks-dir <path>", "check only this .ipynb tree (through nbqa)")
    .option("--skip-install", "do not install missing tools with pip")
    .action(async (actionName: string, names: string[], options: CheckCommandOptions) => {
      const action = parseAction(actionName);
      const checks = resolveChecks(names);
      const targets = resolveTargets(
        action,
        { agentsDir: options.agentsDir, notebooksDir: options.notebooksDir },
        defaultLayout(env)
      );

      if (!options.skipInstall) {
        ensureTools(REQUIRED_TOOLS, {
          executor: deps.executor,
          python: env.PLUMBLINE_PYTHON || undefined,
          onInstall: (tools) =>
            io.out(`Installing missing Python tools: ${tools.join(" ")}`),
        });
      }

      const result = await runChecks({
        action,
        checks,
        targets,
        executor: deps.executor,
        onProgress: (event) => {
          if (event.type === "start") {
            io.out(event.invocation.label);
          } else if (event.isError) {
            io.err(event.output.trimEnd());
          } else {
            io.out(event.output.trimEnd());
          }
        },
      });

      if (result.failed) {
        io.err(
          `Check failed: ${[result.failed.executable, ...result.failed.args].join(" ")} exited with status ${result.exitCode}`
        );
      } else {
        io.out(SUCCESS_MESSAGE);
      }
      setExitCode(result.exitCode);
    });

  // -------------------------------------------------------------------------
  // logs: run one monitoring tool directly
  // -------------------------------------------------------------------------

  /** Validates raw options against a tool schema, runs it and prints the report */
  async function runTool<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    run: (input: T, context: MonitoringContext) => Promise<ToolResult>,
    raw: Record<string, unknown>
  ): Promise<void> {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
        .join("; ");
      io.err(`Error: Invalid arguments: ${issues}`);
      setExitCode(1);
      return;
    }

    const result = await run(parsed.data, monitoring);
    if (result.isError) {
      io.err(result.output);
      setExitCode(1);
    } else {
      io.out(result.output);
      setExitCode(0);
    }
  }

  const logs = program
    .command("logs")
    .description("Query Google Cloud Logging and Cloud Monitoring directly");

  const projectOption = "--project <id>";
  const projectHelp = "Google Cloud project ID (default: GOOGLE_CLOUD_PROJECT)";
  const severityHelp = "severity level or comparison, e.g. ERROR or 'severity >= WARNING'";
  const limitHelp = "maximum number of entries (1-1000, default 10)";

  logs
    .command("latest")
    .description("The 10 most recent log entries")
    .option(projectOption, projectHelp)
    .option("--severity <severity>", severityHelp)
    .action((options: SeverityOptions) =>
      runTool(getLatestLogsSchema, getLatestLogs, {
        projectId: options.project,
        severity: options.severity,
      })
    );

  logs
    .command("error")
    .description("The most recent ERROR entry")
    .option(projectOption, projectHelp)
    .action((options: ProjectOptions) =>
      runTool(getLatestErrorSchema, getLatestError, { projectId: options.project })
    );

  logs
    .command("resource")
    .description("Recent entries for one monitored resource type")
    .argument("<type>", "resource type, e.g. gce_instance")
    .option(projectOption, projectHelp)
    .option("--severity <severity>", severityHelp)
    .option("--limit <n>", limitHelp, parseLimit)
    .action((resource: string, options: SeverityOptions & LimitOptions) =>
      runTool(getResourceLogsSchema, getResourceLogs, {
        projectId: options.project,
        resource,
        severity: options.severity,
        limit: options.limit,
      })
    );

  logs
    .command("range")
    .description("Entries between two ISO 8601 times (default: the last 90 days)")
    .option(projectOption, projectHelp)
    .option("--start <time>", "start of the range, ISO 8601")
    .option("--end <time>", "end of the range, ISO 8601 (default: now)")
    .option("--severity <severity>", severityHelp)
    .option("--limit <n>", limitHelp, parseLimit)
    .action(
      (options: SeverityOptions & LimitOptions & { start?: string; end?: string }) =>
        runTool(getLogsSchema, getLogs, {
          projectId: options.project,
          severity: options.severity,
          startTime: options.start,
          endTime: options.end,
          limit: options.limit,
        })
    );

  logs
    .command("dataflow-job")
    .description("Entries for one Dataflow job")
    .argument("<jobId>", "Dataflow job ID")
    .option(projectOption, projectHelp)
    .option("--limit <n>", limitHelp, parseLimit)
    .action((jobId: string, options: LimitOptions) =>
      runTool(getDataflowJobLogsSchema, getDataflowJobLogs, {
        projectId: options.project,
        jobId,
        limit: options.limit,
      })
    );

  logs
    .command("dataproc-job")
    .description("Entries for one Dataproc job")
    .argument("<jobId>", "Dataproc job ID")
    .option(projectOption, projectHelp)
    .option("--limit <n>", limitHelp, parseLimit)
    .action((jobId: string, options: LimitOptions) =>
      runTool(getDataprocJobLogsSchema, getDataprocJobLogs, {
        projectId: options.project,
        jobId,
        limit: options.limit,
      })
    );

  logs
    .command("dataproc-cluster")
    .description("Entries for one Dataproc cluster, by name or (with --uuid) by UUID")
    .argument("<cluster>", "cluster name, or cluster UUID with --uuid")
    .option("--uuid", "treat <cluster> as the cluster UUID")
    .option(projectOption, projectHelp)
    .option("--limit <n>", limitHelp, parseLimit)
    .action((cluster: string, options: LimitOptions & { uuid?: boolean }) =>
      options.uuid
        ? runTool(getDataprocClusterLogsByUuidSchema, getDataprocClusterLogsByUuid, {
            projectId: options.project,
            clusterUuid: cluster,
            limit: options.limit,
          })
        : runTool(getDataprocClusterLogsSchema, getDataprocClusterLogs, {
            projectId: options.project,
            clusterName: cluster,
            limit: options.limit,
          })
    );

  logs
    .command("cpu")
    .description("CPU utilization of Compute Engine instances over the last 5 minutes")
    .option(projectOption, projectHelp)
    .action((options: ProjectOptions) =>
      runTool(getCpuUtilizationSchema, getCpuUtilization, { projectId: options.project })
    );

  // -------------------------------------------------------------------------
  // ask: the monitoring agent
  // -------------------------------------------------------------------------

  program
    .command("ask")
    .description("Ask the monitoring agent a question about your Google Cloud project")
    .argument("<question>", "natural language question")
    .action(async (question: string) => {
      if (!env.ANTHROPIC_API_KEY) {
        io.err("Error: ANTHROPIC_API_KEY environment variable is not set.");
        io.err("");
        io.err("Export your API key:");
        io.err("  export ANTHROPIC_API_KEY=your-key-here");
        setExitCode(1);
        return;
      }
      setExitCode(await ask(question, io));
    });

  return program;
}

/**
 * Parses user arguments (without the node and script paths) and runs the
 * matching command.
 *
 * @returns The process exit code
 */
export async function runCli(
  args: string[],
  deps: CliDependencies = {}
): Promise<number> {
  const io = deps.io ?? consoleIO;
  let exitCode = 0;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(args, { from: "user" });
    return exitCode;
  } catch (error) {
    // Commander has already printed its own usage message
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CheckUsageError) {
      io.err(`Error: ${error.message}`);
      return error.exitCode;
    }
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

/**
 * Streams the agent's work to the terminal: thinking, tool calls, truncated
 * tool results, then the final answer.
 *
 * LangGraph v2 streamEvents() emits on_chain_stream events whose chunk has
 * one key naming its source:
 * - "agent": AI message with content blocks and optional tool_calls
 * - "tools": tool result messages
 * An agent message without tool_calls is the final answer.
 */
export async function streamAnswer(question: string, io: CliIO): Promise<number> {
  io.out(`\nQuestion: ${question}\n`);

  return withAgentTracing(question, async () => {
    const eventStream = getMonitorAgent().streamEvents(
      { messages: [new HumanMessage(question)] },
      { version: "v2" }
    );

    let finalAnswer = "";

    for await (const event of eventStream) {
      if (event.event !== "on_chain_stream") continue;

      const chunk = event.data?.chunk;
      if (!chunk) continue;

      if (chunk.agent?.messages) {
        for (const msg of chunk.agent.messages) {
          const content = msg.content;

          if (Array.isArray(content)) {
            for (const block of content) {
              if (block.type === "thinking") {
                // \x1b[3m starts italic, \x1b[0m resets formatting
                io.out(`\x1b[3mThinking: ${block.thinking}\x1b[0m\n`);
              }
            }
          }

          if (msg.tool_calls?.length) {
            for (const tc of msg.tool_calls) {
              io.out(`🔧 Tool: ${tc.name}`);
              io.out(`   Args: ${JSON.stringify(tc.args)}`);
            }
          } else if (typeof content === "string") {
            finalAnswer = content;
          } else if (Array.isArray(content)) {
            finalAnswer = "";
            for (const block of content) {
              if (block.type === "text") {
                finalAnswer += block.text;
              }
            }
          }
        }
      }

      if (chunk.tools?.messages) {
        for (const msg of chunk.tools.messages) {
          io.out(`   Result:\n${truncate(String(msg.content), 1100)}\n`);
        }
      }
    }

    if (!finalAnswer) {
      io.err("Error: The agent finished without an answer.");
      return 1;
    }

    setTraceOutput(finalAnswer);
    io.out("─".repeat(60));
    io.out("Answer:");
    io.out(finalAnswer);
    io.out("");
    return 0;
  });
}
