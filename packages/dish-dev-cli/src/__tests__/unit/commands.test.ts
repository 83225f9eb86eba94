/**
 * Command Table Tests
 *
 * Each command must hand docker exactly these command lines, unmodified.
 */

import { CommandRouter } from '../../core/router/command-router.js';
import { stackCommands } from '../../commands/index.js';
import { PROJECT_DIR, RecordingRunner, createTestContext } from '../utils/fakes.js';

const EXPECTED_COMMAND_LINES: Array<[string, string[]]> = [
  ['db-up', ['docker compose up -d']],
  ['db-down', ['docker compose down']],
  ['db-restart', ['docker compose restart']],
  ['db-logs', ['docker compose logs -f']],
  ['full-up', ['docker compose -f docker-compose.full.yml up -d --build']],
  ['full-down', ['docker compose -f docker-compose.full.yml down']],
  ['full-restart', ['docker compose -f docker-compose.full.yml restart']],
  ['full-logs', ['docker-compose -f docker-compose.full.yml logs -f']],
  ['backend-shell', ['docker exec -it dish_backend /bin/bash']],
  ['db-shell', ['docker exec -it dish_postgres psql -U dish_user -d dish_db']],
  ['clean', ['docker compose -f docker-compose.full.yml down -v', 'docker compose down -v']],
];

describe('command table', () => {
  it.each(EXPECTED_COMMAND_LINES)('%s issues the expected invocations', async (name, expected) => {
    const { context } = createTestContext();
    const runner = new RecordingRunner();
    const router = new CommandRouter(context.registry, runner);

    const result = await router.route(name, context);

    expect(runner.commandLines).toEqual(expected);
    expect(result.exitCode).toBe(0);
    expect(result.success).toBe(true);
  });

  it('covers every process command', () => {
    const processCommands = stackCommands.filter((cmd) => cmd.kind === 'process').map((cmd) => cmd.name);
    expect(processCommands.sort()).toEqual(EXPECTED_COMMAND_LINES.map(([name]) => name).sort());
  });

  it('passes argument vectors without going through a shell', async () => {
    const { context } = createTestContext();
    const runner = new RecordingRunner();

    await new CommandRouter(context.registry, runner).route('db-shell', context);

    expect(runner.calls[0].invocation).toEqual({
      file: 'docker',
      args: ['exec', '-it', 'dish_postgres', 'psql', '-U', 'dish_user', '-d', 'dish_db'],
    });
    expect(runner.calls[0].options).toEqual({ cwd: PROJECT_DIR });
  });

  it('builds invocations from the configured names', async () => {
    const { context } = createTestContext();
    context.config = {
      ...context.config,
      compose: { fullFile: 'compose/full.yml' },
      containers: { backend: 'api', backendShell: '/bin/sh', postgres: 'pg' },
      database: { user: 'tester', name: 'scratch' },
    };
    const runner = new RecordingRunner();
    const router = new CommandRouter(context.registry, runner);

    await router.route('full-logs', context);
    await router.route('backend-shell', context);
    await router.route('db-shell', context);

    expect(runner.commandLines).toEqual([
      'docker-compose -f compose/full.yml logs -f',
      'docker exec -it api /bin/sh',
      'docker exec -it pg psql -U tester -d scratch',
    ]);
  });
});

describe('status lines', () => {
  const cases: Array<[string, string[]]> = [
    [
      'db-up',
      [
        '✅ Database started!',
        '📊 PostgreSQL: localhost:5432',
        '🔧 pgAdmin: http://localhost:5050 (admin@dish.local / admin)',
      ],
    ],
    ['db-down', ['✅ Database stopped!']],
    ['db-restart', ['✅ Database restarted!']],
    ['db-logs', []],
    [
      'full-up',
      [
        '✅ Full stack started!',
        '🔙 Backend: http://localhost:8000',
        '🎨 Frontend: http://localhost:3000',
        '📊 PostgreSQL: localhost:5432',
        '🔧 pgAdmin: http://localhost:5050',
      ],
    ],
    ['full-down', ['✅ Full stack stopped!']],
    ['full-restart', ['✅ Full stack restarted!']],
    ['full-logs', []],
    ['backend-shell', []],
    ['db-shell', []],
    ['clean', ['✅ All containers and volumes removed!']],
  ];

  it.each(cases)('%s prints its status after the echoed command lines', async (name, statusLines) => {
    const { context, stdout } = createTestContext();
    const runner = new RecordingRunner();

    await new CommandRouter(context.registry, runner).route(name, context);

    const expected = [...runner.commandLines, ...statusLines].map((line) => `${line}\n`).join('');
    expect(stdout.text).toBe(expected);
  });
});
