import { z } from "zod";
import { formatDeadlineReport } from "../deadlines/format.js";
import { Tool, ToolResult, textResult } from "./types.js";

const argsSchema = z.object({
  timezone: z.string().trim().min(1).optional(),
});

export const getWeeklyDeadlinesTool: Tool = {
  name: "get-weekly-deadlines",
  description:
    "Fetch assignments from every active course and group the upcoming ones by weekday, with a separate list for assignments without a due date",
  inputSchema: {
    type: "object",
    properties: {
      timezone: {
        type: "string",
        description: "IANA timezone for due times and weekdays (defaults to the server setting)",
      },
    },
    required: [],
  },
  execute: async (args, { runner, progress }) => {
    const { timezone } = argsSchema.parse(args);
    let result: ToolResult = textResult("Deadline fetch finished without a result", true);

    await runner.start(
      {
        displayProgress: (completed, total) => progress.report(completed, total),
        displayResult: (report) => {
          result = textResult(formatDeadlineReport(report));
        },
        displayError: (kind, message) => {
          const label = kind === "auth" ? "Authentication failed" : "Failed to fetch deadlines";
          result = textResult(`${label} (${kind}): ${message}`, true);
        },
      },
      { timezone }
    );
    return result;
  }
};
