import pino from 'pino';

// stdout belongs to the MCP stdio transport
export const logger = pino(
  {
    name: 'canvas-deadlines',
    level: process.env.LOG_LEVEL || 'info',
  },
  pino.destination(2)
);

export default logger;
