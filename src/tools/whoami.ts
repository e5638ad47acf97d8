import { resolveIdentity } from "../deadlines/pipeline.js";
import { Tool, textResult } from "./types.js";

export const whoamiTool: Tool = {
  name: "whoami",
  description: "Show which Canvas user the configured access token belongs to",
  inputSchema: { type: "object", properties: {}, required: [] },
  execute: async (_args, { client }) => {
    const identity = await resolveIdentity(client);
    return textResult(`Authenticated as: ${identity.name} (ID: ${identity.id})`);
  }
};
