import { DeadlineRunner } from "../deadlines/runner.js";
import { ProgressReporter } from "../deadlines/progress.js";
import { CanvasRequester, DeadlinesConfig } from "../types.js";

export interface ToolContext {
  client: CanvasRequester;
  runner: DeadlineRunner;
  config: DeadlinesConfig;
  progress: ProgressReporter;
}

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface Tool {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required: string[];
  };
  execute: (args: Record<string, unknown>, context: ToolContext) => Promise<ToolResult>;
}

export function textResult(text: string, isError = false): ToolResult {
  return isError
    ? { content: [{ type: "text", text }], isError: true }
    : { content: [{ type: "text", text }] };
}
