import { Tool } from "./types.js";
import { getWeeklyDeadlinesTool } from "./getWeeklyDeadlines.js";
import { listActiveCoursesTool } from "./listActiveCourses.js";
import { whoamiTool } from "./whoami.js";

export const tools: Tool[] = [
  getWeeklyDeadlinesTool,
  listActiveCoursesTool,
  whoamiTool,
];

export type { Tool, ToolContext, ToolResult } from "./types.js";
export { textResult } from "./types.js";
