/**
 * MCP tool registration for plumbline
 *
 * Registers a single high-level "monitor" tool that wraps the LangGraph
 * monitoring agent. MCP clients ask questions ("why did job X fail?") and
 * get a reasoned answer; the individual log and metric queries happen
 * inside the agent.
 *
 * One call produces one trace:
 *   plumbline.mcp.monitor (root span)
 *   ├── anthropic.chat
 *   ├── execute_tool get_dataflow_job_logs
 *   │   └── gcp.logging list_entries
 *   └── ...
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { invokeMonitor, type MonitorResult } from "../../agent/monitor";
import {
  withMcpRequestTracing,
  setTraceOutput,
  type McpToolResult,
} from "../../tracing/context-bridge";

export const monitorSchema = z.object({
  question: z
    .string()
    .min(1)
    .describe(
      "Natural language question about logs, jobs or resource health in a Google Cloud project"
    ),
});

export type MonitorInput = z.infer<typeof monitorSchema>;

export const monitorDescription = `Investigate a Google Cloud project's logs and metrics using an AI agent.

The agent can:
- Fetch the latest logs or the latest ERROR entry
- Filter logs by resource type, severity or time range
- Read logs of Dataflow jobs, Dataproc jobs and Dataproc clusters
- Report CPU utilization of Compute Engine instances

It makes as many queries as it needs and returns an answer with the evidence.

Example questions:
- "What was the last error in project my-project?"
- "Why did Dataflow job 2025-07-11_02_51_43-123 fail?"
- "Show warnings from gcs_bucket resources"
- "Which VMs are busiest right now?"`;

/** Formats thinking and answer for the root span's output attribute */
export function buildTraceOutput(result: MonitorResult): string {
  const parts: string[] = [];

  if (result.thinking.length > 0) {
    parts.push("=== Thinking ===");
    for (const thought of result.thinking) {
      parts.push(thought);
      parts.push("---");
    }
  }

  parts.push("=== Answer ===");
  parts.push(result.answer);

  return parts.join("\n");
}

/**
 * Handles one monitor call: runs the agent under an MCP root span and
 * returns only the answer (thinking goes to the trace).
 */
export async function handleMonitor(
  input: MonitorInput,
  invoke: (question: string) => Promise<MonitorResult> = invokeMonitor
): Promise<McpToolResult> {
  return withMcpRequestTracing("monitor", { ...input }, async () => {
    const result = await invoke(input.question);
    setTraceOutput(buildTraceOutput(result));

    return {
      content: [{ type: "text" as const, text: result.answer }],
      isError: result.isError,
    };
  });
}

/** Registers the monitor tool with an MCP server */
export function registerMonitorTool(server: McpServer): void {
  server.registerTool(
    "monitor",
    {
      description: monitorDescription,
      inputSchema: monitorSchema.shape,
    },
    async (input: MonitorInput) => handleMonitor(input)
  );
}
