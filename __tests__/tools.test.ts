import { ZodError } from 'zod';
import { DeadlineRunner } from '../src/deadlines/runner.js';
import { getWeeklyDeadlinesTool } from '../src/tools/getWeeklyDeadlines.js';
import { listActiveCoursesTool } from '../src/tools/listActiveCourses.js';
import { whoamiTool } from '../src/tools/whoami.js';
import { ToolContext } from '../src/tools/index.js';
import { DeadlinesConfig } from '../src/types.js';
import { httpError, page } from './helpers.js';

const NOW = new Date('2024-03-04T00:00:00Z');

const config: DeadlinesConfig = {
  apiToken: 'test-secret',
  baseUrl: 'https://canvas.example.edu',
  timezone: 'UTC',
  pageSize: 100,
  timeoutMs: 1000,
};

function context(get: jest.Mock): ToolContext & { progress: { report: jest.Mock } } {
  const client = { get };
  return {
    client,
    config,
    runner: new DeadlineRunner(client, { timezone: config.timezone, clock: () => NOW }),
    progress: { report: jest.fn() },
  };
}

describe('get-weekly-deadlines', () => {
  it('returns the weekly view and forwards progress', async () => {
    const get = jest
      .fn()
      .mockResolvedValueOnce(page({ id: 42, name: 'Sam Student' }))
      .mockResolvedValueOnce(page([{ id: 1, name: 'Calc' }]))
      .mockResolvedValueOnce(
        page([
          { name: 'HW1', due_at: '2024-03-07T23:59:00Z' },
          { name: 'HW2', due_at: null },
        ])
      );
    const ctx = context(get);

    const result = await getWeeklyDeadlinesTool.execute({}, ctx);

    expect(result.isError).toBeUndefined();
    const text = result.content[0].text;
    expect(text.startsWith('Authenticated as: Sam Student (ID: 42)\n\nMonday:\nNo assignments due.')).toBe(true);
    expect(text).toContain('Thursday:\n[Calc] HW1\n   Due: 2024-03-07 23:59 UTC\n   In: 3 days 23 hrs');
    expect(text).toContain('No Due Date:\n[Calc] HW2');
    expect(ctx.progress.report.mock.calls).toEqual([[1, 1]]);
  });

  it('flags authentication failures as tool errors', async () => {
    const ctx = context(jest.fn().mockRejectedValueOnce(httpError(401)));

    const result = await getWeeklyDeadlinesTool.execute({}, ctx);

    expect(result).toEqual({
      content: [
        {
          type: 'text',
          text: 'Authentication failed (auth): Failed to authenticate: invalid or expired token',
        },
      ],
      isError: true,
    });
  });

  it('validates its arguments', async () => {
    const ctx = context(jest.fn());
    await expect(getWeeklyDeadlinesTool.execute({ timezone: 5 }, ctx)).rejects.toBeInstanceOf(ZodError);
  });
});

describe('whoami', () => {
  it('names the token owner', async () => {
    const ctx = context(jest.fn().mockResolvedValueOnce(page({ id: 42, name: 'Sam Student' })));
    const result = await whoamiTool.execute({}, ctx);
    expect(result.content[0].text).toBe('Authenticated as: Sam Student (ID: 42)');
  });
});

describe('list-active-courses', () => {
  it('lists active courses with their ids', async () => {
    const ctx = context(
      jest
        .fn()
        .mockResolvedValueOnce(page({ id: 42, name: 'Sam Student' }))
        .mockResolvedValueOnce(
          page([
            { id: 1, name: 'Calc' },
            { id: 2, name: '' },
          ])
        )
    );

    const result = await listActiveCoursesTool.execute({}, ctx);

    expect(result.content[0].text).toBe('Active Courses:\n\n- Calc [ID: 1]\n- Unnamed Course [ID: 2]');
  });

  it('says when there are none', async () => {
    const ctx = context(
      jest.fn().mockResolvedValueOnce(page({ id: 42, name: 'Sam Student' })).mockResolvedValueOnce(page([]))
    );
    const result = await listActiveCoursesTool.execute({}, ctx);
    expect(result.content[0].text).toBe('No active courses found.');
  });
});
