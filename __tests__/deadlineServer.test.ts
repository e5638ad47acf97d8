import { DeadlineServer } from '../src/deadlineServer.js';
import { DeadlinesConfig } from '../src/types.js';
import { httpError, page } from './helpers.js';

const config: DeadlinesConfig = {
  apiToken: 'test-secret',
  baseUrl: 'https://canvas.example.edu',
  timezone: 'UTC',
  pageSize: 100,
  timeoutMs: 1000,
};

function callTool(name: string, args: Record<string, unknown>, progressToken?: string) {
  return {
    method: 'tools/call' as const,
    params: progressToken === undefined ? { name, arguments: args } : { name, arguments: args, _meta: { progressToken } },
  };
}

describe('DeadlineServer.handleCallTool', () => {
  it('turns the progress token into progress notifications', async () => {
    const get = jest
      .fn()
      .mockResolvedValueOnce(page({ id: 42, name: 'Sam Student' }))
      .mockResolvedValueOnce(page([{ id: 1, name: 'Calc' }]))
      .mockResolvedValueOnce(page([{ name: 'HW2', due_at: null }]));
    const sendNotification = jest.fn().mockResolvedValue(undefined);
    const server = new DeadlineServer(config, { get });

    const result = await server.handleCallTool(callTool('get-weekly-deadlines', {}, 'tok-1'), { sendNotification });

    expect(result.isError).toBeUndefined();
    expect(result.content[0].text).toContain('No Due Date:\n[Calc] HW2');
    expect(sendNotification).toHaveBeenCalledTimes(1);
    expect(sendNotification).toHaveBeenCalledWith({
      method: 'notifications/progress',
      params: {
        progressToken: 'tok-1',
        progress: 1,
        total: 1,
        message: 'Compiled assignments for 1 of 1 courses',
      },
    });
  });

  it('sends no notifications without a progress token', async () => {
    const get = jest
      .fn()
      .mockResolvedValueOnce(page({ id: 42, name: 'Sam Student' }))
      .mockResolvedValueOnce(page([{ id: 1, name: 'Calc' }]))
      .mockResolvedValueOnce(page([]));
    const sendNotification = jest.fn().mockResolvedValue(undefined);
    const server = new DeadlineServer(config, { get });

    await server.handleCallTool(callTool('get-weekly-deadlines', {}), { sendNotification });

    expect(sendNotification).not.toHaveBeenCalled();
  });

  it('reports an unknown tool as an error result', async () => {
    const server = new DeadlineServer(config, { get: jest.fn() });

    const result = await server.handleCallTool(callTool('post-announcement', {}), { sendNotification: jest.fn() });

    expect(result).toEqual({ content: [{ type: 'text', text: 'Unknown tool: post-announcement' }], isError: true });
  });

  it('reports invalid arguments as an error result', async () => {
    const get = jest.fn();
    const server = new DeadlineServer(config, { get });

    const result = await server.handleCallTool(callTool('get-weekly-deadlines', { timezone: 5 }), {
      sendNotification: jest.fn(),
    });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Invalid arguments for get-weekly-deadlines: Expected string, received number' }],
      isError: true,
    });
    expect(get).not.toHaveBeenCalled();
  });

  it('reports deadline errors with their kind', async () => {
    const server = new DeadlineServer(config, { get: jest.fn().mockRejectedValueOnce(httpError(401)) });

    const result = await server.handleCallTool(callTool('whoami', {}), { sendNotification: jest.fn() });

    expect(result).toEqual({
      content: [{ type: 'text', text: 'Tool execution failed (auth): Failed to authenticate: invalid or expired token' }],
      isError: true,
    });
  });
});
