import { agentsCommand } from '../../../src/cli/commands/agents.js';
import { configCommand } from '../../../src/cli/commands/config.js';
import { RecordingExecutor } from '../../helpers/fakes.js';
import { testContext } from '../../helpers/context.js';

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

const SHOW_DEFAULTS = [
  '\n📋 Current configuration:\n',
  '   Config file: /cfg/config.json',
  '   Default agent: claude',
  '   Idle threshold: 10m0s',
  '   Scan interval: 10s',
  '   Log directory: /cfg/logs',
  '',
];

describe('configCommand', () => {
  it('shows the current configuration', () => {
    const { ctx, printed } = testContext();

    configCommand({ show: true }, ctx);

    expect(printed()).toEqual(SHOW_DEFAULTS);
  });

  it('shows the configuration when nothing is changed', () => {
    const { ctx, printed } = testContext();

    configCommand({}, ctx);

    expect(printed()).toEqual(SHOW_DEFAULTS);
  });

  it('saves the default agent', () => {
    const { ctx, storage, printed } = testContext();

    configCommand({ defaultAgent: 'codex' }, ctx);

    expect(JSON.parse(storage.readFile('/cfg/config.json', 'utf-8'))).toEqual({ defaultAgent: 'codex' });
    expect(printed()).toEqual(['✅ Default agent set to codex']);
  });

  it('warns about an agent it does not recognise but still saves it', () => {
    const { ctx, storage, printed } = testContext();

    configCommand({ defaultAgent: 'aider' }, ctx);

    expect(printed()).toEqual([
      "⚠️ 'aider' is not a recognised agent; its panes will not be discovered.",
      '✅ Default agent set to aider',
    ]);
    expect(storage.readFile('/cfg/config.json', 'utf-8')).toContain('"defaultAgent": "aider"');
  });

  it('saves durations and shows the result with --show', () => {
    const { ctx, printed } = testContext();

    configCommand({ idle: ' 5m ', scan: '30s', show: true }, ctx);

    expect(printed()).toEqual([
      '✅ Idle threshold set to 5m',
      '✅ Scan interval set to 30s',
      '\n📋 Current configuration:\n',
      '   Config file: /cfg/config.json',
      '   Default agent: claude',
      '   Idle threshold: 5m0s',
      '   Scan interval: 30s',
      '   Log directory: /cfg/logs',
      '',
    ]);
  });

  it('rejects an invalid duration without saving', () => {
    const { ctx, storage } = testContext();

    expect(() => configCommand({ idle: 'soon' }, ctx)).toThrow('invalid --idle value: soon');
    expect(storage.exists('/cfg/config.json')).toBe(false);
  });

  it('rejects a zero scan interval', () => {
    const { ctx, storage } = testContext();

    expect(() => configCommand({ scan: '0s' }, ctx)).toThrow('invalid --scan value: 0s: must be greater than zero');
    expect(storage.exists('/cfg/config.json')).toBe(false);
  });

  it('rejects an empty agent name', () => {
    const { ctx } = testContext();

    expect(() => configCommand({ defaultAgent: '  ' }, ctx)).toThrow('default agent must not be empty');
  });
});

describe('agentsCommand', () => {
  it('lists agents with their install status', () => {
    const executor = new RecordingExecutor().fail("command -v 'codex'", 'exit status 1');
    const { ctx, printed } = testContext({ executor });

    agentsCommand(ctx);

    expect(printed()).toEqual([
      '\n🤖 Recognised coding agents:\n',
      '  Claude Code',
      '    Command: claude',
      '    Installed: yes',
      '',
      '  Codex',
      '    Command: codex',
      '    Installed: no',
      '',
    ]);
  });
});
