import { SimulatedHost } from '../../src/adapters/host/simulated-host';
import { TransientActionError } from '../../src/domain/errors';

function ctx(signal = new AbortController().signal) {
  return { signal, timeoutMs: 1000 };
}

describe('SimulatedHost', () => {
  test('records effects in memory', async () => {
    const host = new SimulatedHost();
    await host.installPackage({ name: 'numpy', version: '1.26.4', manager: 'pip', env: 'ml' }, ctx());
    await host.createInterpreterEnv({ name: 'ml', pythonVersion: '3.11' }, ctx());
    await host.setPermission({ path: 'run.sh', mode: '755' }, ctx());

    expect(host.packages.get('ml/numpy')).toBe('1.26.4');
    expect(host.envs.get('ml')).toBe('3.11');
    expect(host.modes.get('run.sh')).toBe('755');
    expect(host.calls.map((c) => c.operation)).toEqual(['installPackage', 'createInterpreterEnv', 'setPermission']);
  });

  test('serves configured artifact content', async () => {
    const host = new SimulatedHost({ artifacts: { 'https://example.test/a.txt': 'hello' } });
    const result = await host.fetchArtifact({ url: 'https://example.test/a.txt', destination: 'a.txt' }, ctx());

    expect(result.sha256).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
    expect(host.files.get('a.txt')).toBe(result.sha256);
  });

  test('scripted failures apply to the matching target only', async () => {
    const host = new SimulatedHost().failNext('installPackage', new TransientActionError('mirror down'), 1, 'scipy');

    await expect(host.installPackage({ name: 'numpy', manager: 'pip' }, ctx())).resolves.toEqual({ version: undefined });
    await expect(host.installPackage({ name: 'scipy', manager: 'pip' }, ctx())).rejects.toThrow('mirror down');
    await expect(host.installPackage({ name: 'scipy', manager: 'pip' }, ctx())).resolves.toEqual({ version: undefined });
  });

  test('misreports a value', async () => {
    const host = new SimulatedHost().misreport('run.sh', '644');
    expect(await host.setPermission({ path: 'run.sh', mode: '755' }, ctx())).toEqual({ mode: '644' });
  });

  test('latency honors the abort signal', async () => {
    const host = new SimulatedHost({ latencyMs: 1000 });
    const controller = new AbortController();
    const pending = host.setPermission({ path: 'run.sh', mode: '755' }, ctx(controller.signal));
    controller.abort();

    await expect(pending).rejects.toThrow('Operation aborted');
    expect(host.modes.has('run.sh')).toBe(false);
    expect(host.calls[0].finishedAt).toBeDefined();
  });
});
