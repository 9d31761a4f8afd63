import { describe, it, expect } from 'vitest';
import { MemoryBackend, loadDemoCatalog } from './memory-backend.js';

function backend() {
  return new MemoryBackend({
    catalog: [
      { id: 'Foo.Foo', name: 'Foo', version: '2.0', source: 'winget', publisher: 'Foo Ltd' },
      { id: 'Bar.Bar', name: 'Bar', version: '1.0', source: 'winget' },
      { id: '9STOREAPP', name: 'Store App', version: '3.1', source: 'msstore' },
    ],
    installed: [
      { id: 'Foo.Foo', version: '1.0' },
      { id: 'Bar.Bar', version: '1.0' },
    ],
  });
}

describe('MemoryBackend', () => {
  it('lists installed packages sorted by name with available versions', async () => {
    expect(await backend().listInstalled()).toEqual([
      { id: 'Bar.Bar', name: 'Bar', version: '1.0', source: 'winget' },
      { id: 'Foo.Foo', name: 'Foo', version: '1.0', availableVersion: '2.0', source: 'winget' },
    ]);
  });

  it('searches by id or name and honours the filter', async () => {
    const memory = backend();
    expect((await memory.search('app', 'all')).map((p) => p.id)).toEqual(['9STOREAPP']);
    expect(await memory.search('app', 'winget')).toEqual([]);
    expect(await memory.search('   ', 'all')).toEqual([]);
  });

  it('installs, upgrades and uninstalls', async () => {
    const memory = backend();
    await memory.install('9STOREAPP');
    await memory.upgrade('Foo.Foo');
    await memory.uninstall('Bar.Bar');

    expect((await memory.listInstalled()).map((p) => `${p.id}@${p.version}`)).toEqual(['Foo.Foo@2.0', '9STOREAPP@3.1']);
    expect(await memory.listUpgrades()).toEqual([]);
  });

  it('rejects impossible operations with backend errors', async () => {
    const memory = backend();
    await expect(memory.install('Foo.Foo')).rejects.toMatchObject({ reason: 'exit', message: 'Foo.Foo is already installed' });
    await expect(memory.uninstall('9STOREAPP')).rejects.toMatchObject({ message: '9STOREAPP is not installed' });
    await expect(memory.upgrade('Bar.Bar')).rejects.toMatchObject({ message: 'No applicable upgrade found for Bar.Bar' });
    await expect(memory.fetchDetails('Nope')).rejects.toMatchObject({ message: 'No package found matching Nope' });
  });

  it('returns details with the installed version', async () => {
    expect(await backend().fetchDetails('Foo.Foo')).toEqual({
      id: 'Foo.Foo',
      name: 'Foo',
      version: '1.0',
      publisher: 'Foo Ltd',
      description: '',
      homepage: '',
      license: '',
      source: 'winget',
    });
  });

  it('loads the bundled demo catalog', () => {
    const demo = loadDemoCatalog();
    expect(demo.catalog.length).toBeGreaterThan(0);
    expect(demo.installed?.every((entry) => demo.catalog.some((c) => c.id === entry.id))).toBe(true);
  });
});
