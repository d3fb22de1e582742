import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

import {
  renderActivationScript,
  renderLinuxDesktopEntry,
  renderWindowsShortcutScript,
  writeActivationScript,
  writeDesktopShortcut
} from '../../src/core/launcher/launcher-writer.js';
import { FakeRunner, makeTempDir, removeDir } from '../test-helpers.js';

const options = {
  appName: 'facecam',
  envName: 'facecam-env',
  entryPoint: 'main.py',
  args: ['--mode', 'live view'],
};

describe('renderActivationScript', () => {
  it('activates conda and the environment before starting the app on posix', () => {
    const rendered = renderActivationScript(
      { environmentManagerRoot: '/opt/conda', targetDirectory: '/home/user/facecam' },
      { ...options, platform: 'linux' }
    );
    assert.equal(rendered.fileName, 'facecam.sh');
    assert.equal(
      rendered.content,
      [
        '#!/usr/bin/env bash',
        '# facecam launcher',
        'source "/opt/conda/bin/activate"',
        'conda activate "facecam-env"',
        'python "/home/user/facecam/main.py" --mode "live view" "$@"',
        ''
      ].join('\n')
    );
  });

  it('writes a batch file with CRLF line endings on Windows', () => {
    const rendered = renderActivationScript(
      { environmentManagerRoot: 'C:\\Miniconda3', targetDirectory: 'C:\\Apps\\facecam' },
      { ...options, args: [], platform: 'win32' }
    );
    assert.equal(rendered.fileName, 'facecam.bat');
    assert.equal(
      rendered.content,
      [
        '@echo off',
        'REM facecam launcher',
        'call "C:\\Miniconda3\\Scripts\\activate.bat" "C:\\Miniconda3"',
        'call conda activate "facecam-env"',
        'python "C:\\Apps\\facecam\\main.py" %*',
        ''
      ].join('\r\n')
    );
  });
});

describe('shortcut rendering', () => {
  it('renders a Linux desktop entry that runs in a terminal', () => {
    const entry = renderLinuxDesktopEntry('/home/user/facecam/facecam.sh', {
      appName: 'facecam',
      workingDirectory: '/home/user/facecam'
    });
    assert.equal(entry.fileName, 'facecam.desktop');
    assert.equal(
      entry.content,
      '[Desktop Entry]\nType=Application\nName=facecam\nExec="/home/user/facecam/facecam.sh"\nPath=/home/user/facecam\nTerminal=true\n'
    );
  });

  it('escapes single quotes in the PowerShell shortcut script', () => {
    const script = renderWindowsShortcutScript("C:\\O'Brien\\app.bat", 'C:\\Desktop\\app.lnk', 'C:\\O\'Brien');
    assert.equal(
      script,
      "$s = (New-Object -ComObject WScript.Shell).CreateShortcut('C:\\Desktop\\app.lnk'); " +
        "$s.TargetPath = 'C:\\O''Brien\\app.bat'; " +
        "$s.WorkingDirectory = 'C:\\O''Brien'; " +
        '$s.Save()'
    );
  });
});

describe('writing launcher files', () => {
  let dir: string;

  before(async () => {
    dir = await makeTempDir('launcher');
  });

  after(async () => {
    await removeDir(dir);
  });

  it('writes an executable activation script into the target directory', async () => {
    const target = join(dir, 'app');
    const scriptPath = await writeActivationScript(
      { environmentManagerRoot: '/opt/conda', targetDirectory: target },
      { ...options, args: [], platform: 'linux' }
    );
    assert.equal(scriptPath, join(target, 'facecam.sh'));
    const content = await readFile(scriptPath, 'utf8');
    assert.equal(content.split('\n')[4], `python "${join(target, 'main.py')}" "$@"`);
    if (process.platform !== 'win32') {
      assert.equal((await stat(scriptPath)).mode & 0o777, 0o755);
    }
  });

  it('writes a .desktop entry on Linux', async () => {
    const desktop = join(dir, 'Desktop');
    const result = await writeDesktopShortcut('/apps/facecam.sh', {
      appName: 'facecam',
      desktopDir: desktop,
      workingDirectory: '/apps',
      platform: 'linux',
      runner: new FakeRunner()
    });
    assert.deepEqual(result, { exitCode: 0, message: `Created desktop shortcut ${join(desktop, 'facecam.desktop')}` });
    assert.match(await readFile(join(desktop, 'facecam.desktop'), 'utf8'), /^Exec="\/apps\/facecam.sh"$/m);
  });

  it('writes a .command file on macOS', async () => {
    const desktop = join(dir, 'MacDesktop');
    await writeDesktopShortcut('/apps/facecam.sh', {
      appName: 'facecam',
      desktopDir: desktop,
      workingDirectory: '/apps',
      platform: 'darwin',
      runner: new FakeRunner()
    });
    assert.equal(
      await readFile(join(desktop, 'facecam.command'), 'utf8'),
      '#!/usr/bin/env bash\nexec "/apps/facecam.sh" "$@"\n'
    );
  });

  it('reports a failed PowerShell shortcut on Windows', async () => {
    const runner = new FakeRunner().on(call => call.command === 'powershell.exe', { exitCode: 1, stderr: 'Access denied' });
    const result = await writeDesktopShortcut('C:\\apps\\facecam.bat', {
      appName: 'facecam',
      desktopDir: 'C:\\Users\\me\\Desktop',
      workingDirectory: 'C:\\apps',
      platform: 'win32',
      runner
    });
    assert.deepEqual(result, { exitCode: 1, message: 'shortcut creation exited with code 1: Access denied' });
  });
});
