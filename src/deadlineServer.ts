import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  type CallToolRequest,
  type GetPromptResult,
  type ServerNotification,
} from "@modelcontextprotocol/sdk/types.js";
import { ZodError } from "zod";
import { createCanvasClient } from "./api/canvasClient.js";
import { DeadlineRunner } from "./deadlines/runner.js";
import { createProgressNotifier } from "./deadlines/progress.js";
import { DeadlineError } from "./errors.js";
import { logger } from "./logger.js";
import { tools, Tool, ToolResult, textResult } from "./tools/index.js";
import { CanvasRequester, DeadlinesConfig } from "./types.js";

const SUMMARIZE_UPCOMING_WEEK = `Please provide a summary of my upcoming assignments. Follow these steps:

1. Use the get-weekly-deadlines tool to fetch assignments from all my active courses, grouped by weekday.

2. Organize the result into a prioritized summary:
   - Items due within a day (highest priority)
   - Items due in the next 3 days (high priority)
   - Items due in 4-7 days (medium priority)
   - Assignments without a due date I should keep in mind

3. For each item, include the assignment name, course name, due time and the time remaining.

4. Start with a short overview: total upcoming items and any days where several deadlines cluster.`;

// Exposes the Canvas deadline pipeline through the Model Context Protocol
export class DeadlineServer {
  private server: Server;
  private client: CanvasRequester;
  private runner: DeadlineRunner;
  private tools: Tool[];

  constructor(private readonly config: DeadlinesConfig, client?: CanvasRequester) {
    this.server = new Server(
      {
        name: "canvas-deadlines",
        version: "1.0.0",
      },
      {
        capabilities: {
          tools: {},
          prompts: {},
        },
      }
    );

    this.client = client ?? createCanvasClient(config);
    this.runner = new DeadlineRunner(this.client, {
      timezone: config.timezone,
      pageSize: config.pageSize,
    });
    this.tools = tools;

    this.setupRequestHandlers();
  }

  private setupRequestHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      logger.debug("Received ListToolsRequest");
      return {
        tools: this.tools.map(({ name, description, inputSchema }) => ({
          name,
          description,
          inputSchema,
        })),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, (request, extra) => this.handleCallTool(request, extra));

    this.server.setRequestHandler(ListPromptsRequestSchema, async () => {
      return {
        prompts: [
          {
            name: "summarize-upcoming-week",
            description: "Summarize assignments due soon across all active courses",
            arguments: [],
          },
        ],
      };
    });

    this.server.setRequestHandler(GetPromptRequestSchema, async (request): Promise<GetPromptResult> => {
      if (request.params.name === "summarize-upcoming-week") {
        return {
          messages: [
            {
              role: "user",
              content: { type: "text", text: SUMMARIZE_UPCOMING_WEEK },
            },
          ],
        };
      }

      logger.warn(`Unknown prompt requested: ${request.params.name}`);
      return { messages: [] };
    });
  }

  // Runs one tool call; progress goes back to the caller when it sent a progressToken
  async handleCallTool(
    request: CallToolRequest,
    extra: { sendNotification: (notification: ServerNotification) => Promise<void> }
  ): Promise<ToolResult> {
    const { name, arguments: args } = request.params;
    logger.info(`Received CallToolRequest for: ${name} with args: ${JSON.stringify(args ?? {})}`);

    const tool = this.tools.find((t) => t.name === name);
    if (!tool) {
      return textResult(`Unknown tool: ${name}`, true);
    }

    const progress = createProgressNotifier(request.params._meta?.progressToken, (notification) =>
      extra.sendNotification(notification)
    );

    try {
      return await tool.execute(args ?? {}, {
        client: this.client,
        runner: this.runner,
        config: this.config,
        progress,
      });
    } catch (error: unknown) {
      logger.error({ err: error }, `Error executing tool '${name}'`);
      if (error instanceof ZodError) {
        return textResult(`Invalid arguments for ${name}: ${error.issues.map((i) => i.message).join("; ")}`, true);
      }
      if (error instanceof DeadlineError) {
        return textResult(`Tool execution failed (${error.kind}): ${error.message}`, true);
      }
      return textResult(
        error instanceof Error ? `Tool execution failed: ${error.message}` : "Tool execution failed",
        true
      );
    }
  }

  // Starts the server using stdio transport
  public async start() {
    const transport = new StdioServerTransport();
    logger.info("Connecting server to stdio transport...");
    try {
      await this.server.connect(transport);
      logger.info("Canvas deadline server connected and running on stdio");
    } catch (error: unknown) {
      logger.error({ err: error }, "Error connecting server to stdio transport");
      throw error;
    }
  }
}
