import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {
  ConfigError,
  ConfigManager,
  ConfigSource,
  DEFAULT_PARAMETERS,
  applyParameter,
  defaultSessionConfig,
  loadEnvParameters,
  loadEnvSessionConfig,
  loadParametersFile,
  loadTargets,
  parseBooleanParameter,
  parseIntegerParameter,
  validateParameters
} from '../utils/config';
import { MonitorParameters } from '../models/Config';

describe('parameter parsing', () => {
  it('parses signed integers', () => {
    expect(parseIntegerParameter(' 42 ', 'cycles')).toBe(42);
    expect(parseIntegerParameter('-1', 'cycles')).toBe(-1);
    expect(parseIntegerParameter('+3', 'cycles')).toBe(3);
  });

  it('rejects non-integers with a ConfigError', () => {
    expect(() => parseIntegerParameter('1.5', 'delay')).toThrow(ConfigError);
    expect(() => parseIntegerParameter('ten', 'delay')).toThrow('Parameter delay must be an integer, got "ten"');
  });

  it('accepts true, yes, on and 1 as booleans', () => {
    expect(['true', 'YES', ' on ', '1'].map(parseBooleanParameter)).toEqual([true, true, true, true]);
    expect(['false', 'no', '0', ''].map(parseBooleanParameter)).toEqual([false, false, false, false]);
  });

  it('applies known names case-insensitively and ignores unknown ones', () => {
    const params: Partial<MonitorParameters> = {};

    expect(applyParameter(params, 'VPNURLIP', ' 10.0.0.1 ')).toBe(true);
    expect(applyParameter(params, 'cycles', '-1')).toBe(true);
    expect(applyParameter(params, 'colour', 'blue')).toBe(false);

    expect(params).toEqual({ vpnAddress: '10.0.0.1', cycles: -1 });
  });
});

describe('file loading', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gatewatch-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns null for an absent parameters file', async () => {
    await expect(loadParametersFile(path.join(dir, 'missing.csv'))).resolves.toBeNull();
  });

  it('reads name,value lines and skips blank lines', async () => {
    const file = path.join(dir, 'params.csv');
    await fs.writeFile(file, 'vpnname,Branch Office\n\nvpnurlip,vpn.example.test\r\ndelay,60\nquiet,yes\nunknown,1\n');

    await expect(loadParametersFile(file)).resolves.toEqual({
      vpnName: 'Branch Office',
      vpnAddress: 'vpn.example.test',
      delaySeconds: 60,
      quiet: true
    });
  });

  it('raises a ConfigError for a bad integer in the parameters file', async () => {
    const file = path.join(dir, 'params.csv');
    await fs.writeFile(file, 'cycles,many\n');

    await expect(loadParametersFile(file)).rejects.toThrow(ConfigError);
  });

  it('raises a ConfigError for a known name without a value field', async () => {
    const file = path.join(dir, 'params.csv');
    await fs.writeFile(file, 'vpnurlip,10.0.0.1\nvpnname\n');

    await expect(loadParametersFile(file)).rejects.toThrow(
      `Malformed entry on line 2 of the params file ${file}: expected "name,value"`
    );
  });

  it('ignores an unknown name without a value field', async () => {
    const file = path.join(dir, 'params.csv');
    await fs.writeFile(file, 'comment\nvpnurlip,10.0.0.1\n');

    await expect(loadParametersFile(file)).resolves.toEqual({ vpnAddress: '10.0.0.1' });
  });

  it('raises a ConfigError when the parameters path cannot be read', async () => {
    await expect(loadParametersFile(dir)).rejects.toThrow(ConfigError);
  });

  it('reports an absent targets file as not found with no targets', async () => {
    const result = await loadTargets(path.join(dir, 'targets.csv'));

    expect(result.found).toBe(false);
    expect(result.targets.size).toBe(0);
  });

  it('loads targets in file order using only the first two fields', async () => {
    const file = path.join(dir, 'targets.csv');
    await fs.writeFile(file, '10.0.0.2,host-a,extra\n\nhttps://intranet.example.test, Intranet \n10.0.0.3,host-c\n');

    const { targets, found } = await loadTargets(file);

    expect(found).toBe(true);
    expect(Array.from(targets.entries())).toEqual([
      ['10.0.0.2', 'host-a'],
      ['https://intranet.example.test', 'Intranet'],
      ['10.0.0.3', 'host-c']
    ]);
  });

  it('reports the file line number of a malformed target entry', async () => {
    const file = path.join(dir, 'targets.csv');
    await fs.writeFile(file, '10.0.0.2,host-a\n\n10.0.0.3\n');

    await expect(loadTargets(file)).rejects.toThrow(/line 3 of the targets file/);
  });
});

describe('environment loading', () => {
  it('maps GATEWATCH_* variables onto parameters', () => {
    expect(loadEnvParameters({
      GATEWATCH_VPNURLIP: '10.0.0.1',
      GATEWATCH_CYCLES: '5',
      GATEWATCH_QUIET: 'on',
      GATEWATCH_TARGET_PINGS: '4',
      UNRELATED: 'x'
    })).toEqual({ vpnAddress: '10.0.0.1', cycles: 5, quiet: true, targetPings: 4 });
  });

  it('applies session tunables from the environment', () => {
    const base = defaultSessionConfig('linux');
    const config = loadEnvSessionConfig(base, {
      GATEWATCH_CMD_DELAY_MS: '250',
      GATEWATCH_EXPECT_TIMEOUT_MS: '5000',
      GATEWATCH_VPN_CLI: '/usr/local/bin/vpn'
    });

    expect(config.commandDelay).toBe(250);
    expect(config.expectTimeout).toBe(5000);
    expect(config.toolCommand).toBe('/usr/local/bin/vpn');
    expect(base.commandDelay).toBe(500);
  });
});

describe('defaultSessionConfig', () => {
  it('uses cmd.exe and the AnyConnect process names on Windows', () => {
    const config = defaultSessionConfig('win32');

    expect(config.preemptProcesses).toEqual(['vpnui.exe', 'vpncli.exe']);
    expect(config.toolProcesses).toEqual(['vpncli.exe']);
    expect(config.toolPrompt).toBe('VPN>');
    expect(config.shellPrompt).toBe('>');
  });

  it('uses an interactive sh elsewhere', () => {
    const config = defaultSessionConfig('linux');

    expect(config.shell).toBe('/bin/sh');
    expect(config.shellArgs).toEqual(['-i']);
    expect(config.preemptProcesses).toEqual(['vpnui', 'vpn']);
    expect(config.toolProcesses).toEqual(['vpn']);
    expect(config.commandDelay).toBe(500);
    expect(config.expectTimeout).toBe(120000);
  });
});

describe('validateParameters', () => {
  const valid: MonitorParameters = { ...DEFAULT_PARAMETERS, vpnAddress: '10.0.0.1', username: 'test-user' };

  it('accepts the defaults with an address', () => {
    expect(validateParameters(valid)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('rejects a negative delay and a zero target ping count', () => {
    const result = validateParameters({ ...valid, delaySeconds: -1, targetPings: 0 });

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(2);
  });

  it('rejects a delay longer than a timer can wait', () => {
    expect(validateParameters({ ...valid, delaySeconds: 2147483 }).valid).toBe(true);
    expect(validateParameters({ ...valid, delaySeconds: 2147484 }).errors).toEqual([
      'delay must be at most 2147483 seconds'
    ]);
  });

  it('warns that one target ping makes Warn unreachable', () => {
    const result = validateParameters({ ...valid, targetPings: 1 });

    expect(result.valid).toBe(true);
    expect(result.warnings).toHaveLength(1);
  });
});

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gatewatch-manager-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('layers file, environment and overrides over the defaults', async () => {
    const file = path.join(dir, 'params.csv');
    await fs.writeFile(file, 'vpnurlip,10.0.0.1\ncycles,3\ndelay,10\n');

    const manager = new ConfigManager();
    await expect(manager.loadFromFile(file)).resolves.toBe(true);
    manager.loadFromEnvironment({ GATEWATCH_CYCLES: '7' });
    manager.applyOverrides({ delaySeconds: 0, vpnName: undefined });

    const params = manager.getParameters();
    expect(params.vpnAddress).toBe('10.0.0.1');
    expect(params.cycles).toBe(7);
    expect(params.delaySeconds).toBe(0);
    expect(params.vpnName).toBe('VPN Gateway');
    expect(manager.getMetadata().sources).toEqual([
      ConfigSource.DEFAULT,
      ConfigSource.FILE,
      ConfigSource.ENVIRONMENT,
      ConfigSource.COMMAND_LINE
    ]);
  });

  it('leaves the defaults alone when the file is absent', async () => {
    const manager = new ConfigManager();

    await expect(manager.loadFromFile(path.join(dir, 'none.csv'))).resolves.toBe(false);
    expect(manager.getParameters()).toEqual(DEFAULT_PARAMETERS);
  });
});
