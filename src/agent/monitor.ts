/**
 * monitor.ts - The agentic loop that answers questions about a Google Cloud project
 *
 * The agent follows the ReAct pattern: it reasons about what it knows, calls a
 * monitoring tool (get_latest_error, get_dataflow_job_logs, ...), observes the
 * report, and repeats until it can answer.
 *
 * What parts are LangChain?
 * - ChatAnthropic: LangChain's wrapper for calling Claude
 * - createReactAgent: LangGraph's implementation of the ReAct loop
 * - The tools array from ../tools/langchain
 */

import { ChatAnthropic } from "@langchain/anthropic";
import { createReactAgent } from "@langchain/langgraph/prebuilt";
import { HumanMessage } from "@langchain/core/messages";
import * as fs from "fs";
import * as path from "path";
import { createMonitoringTools } from "../tools/langchain";

/** The Anthropic model used by the monitoring agent */
export const ANTHROPIC_MODEL = "claude-sonnet-4-20250514";

/**
 * Result from invoking the monitoring agent.
 *
 * Thinking is kept apart from the answer so MCP responses carry only the
 * answer while traces can record both.
 */
export interface MonitorResult {
  answer: string;
  thinking: string[];
  isError: boolean;
}

/** src/agent → project root → prompts/ */
const promptPath = path.join(__dirname, "../../prompts/monitor.md");

let cachedPrompt: string | null = null;

/**
 * Loads the system prompt on first use.
 * @throws Error naming the prompt path when the file can't be read
 */
export function getSystemPrompt(): string {
  if (cachedPrompt === null) {
    try {
      cachedPrompt = fs.readFileSync(promptPath, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(
        `Could not load system prompt from ${promptPath}: ${reason}. ` +
          "Make sure prompts/monitor.md exists in the project root."
      );
    }
  }
  return cachedPrompt;
}

let cachedAgent: ReturnType<typeof createReactAgent> | null = null;

/**
 * Gets the monitoring agent, creating it on first call.
 *
 * Created lazily because the ChatAnthropic constructor validates the API key:
 * building it at import time would throw before the CLI can report a missing
 * ANTHROPIC_API_KEY.
 *
 * Extended thinking constraints:
 * - budget_tokens: at least 1024
 * - maxTokens: must be greater than budget_tokens
 * - temperature: cannot be set
 */
export function getMonitorAgent() {
  if (!cachedAgent) {
    const model = new ChatAnthropic({
      model: ANTHROPIC_MODEL,
      maxTokens: 10000,
      thinking: { type: "enabled", budget_tokens: 4000 },
      // Interleaved thinking lets Claude reason between tool calls
      clientOptions: {
        defaultHeaders: {
          "anthropic-beta": "interleaved-thinking-2025-05-14",
        },
      },
    });

    cachedAgent = createReactAgent({
      llm: model,
      tools: createMonitoringTools(),
      stateModifier: getSystemPrompt(),
    });
  }
  return cachedAgent;
}

/** Truncates text to maxLength characters, adding "..." when shortened */
export function truncate(text: string, maxLength: number = 1100): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength) + "...";
}

/**
 * Splits a message's content into thinking blocks and answer text.
 *
 * With extended thinking, Claude returns content blocks:
 * - { type: "thinking", thinking: "..." }
 * - { type: "text", text: "..." }
 * Without it, content is a plain string.
 */
export function parseContent(content: unknown): {
  answer: string;
  thinking: string[];
} {
  if (typeof content === "string") {
    return { answer: content, thinking: [] };
  }

  const thinking: string[] = [];
  let answer = "";
  if (Array.isArray(content)) {
    for (const block of content) {
      if (typeof block !== "object" || block === null || !("type" in block)) {
        continue;
      }
      if (block.type === "thinking" && "thinking" in block) {
        thinking.push(String(block.thinking));
      } else if (block.type === "text" && "text" in block) {
        answer += String(block.text);
      }
    }
  }
  return { answer, thinking };
}

/**
 * Runs the agent to completion and returns a structured result.
 * Never throws: failures become `isError: true` answers.
 */
export async function invokeMonitor(question: string): Promise<MonitorResult> {
  try {
    const agent = getMonitorAgent();
    const result = await agent.invoke({
      messages: [new HumanMessage(question)],
    });

    const lastMessage = result.messages[result.messages.length - 1];
    const { answer, thinking } = parseContent(lastMessage?.content);

    return { answer, thinking, isError: false };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      answer: `Monitoring request failed: ${message}`,
      thinking: [],
      isError: true,
    };
  }
}
