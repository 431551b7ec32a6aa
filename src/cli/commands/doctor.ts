import { execaCommand } from 'execa';
import { loadConfig } from '../../config/loader.js';
import { NodeFileSystem } from '../../core/fs.js';
import { errorMessage } from '../../core/errors.js';
import { clipboardCommands } from '../../input/clipboard.js';
import { colors } from '../ui.js';

interface Check {
  name: string;
  status: 'ok' | 'warn' | 'error';
  message: string;
}

export async function doctorCommand(): Promise<void> {
  console.log(colors.brand('mimic doctor\n'));

  const checks: Check[] = [];
  const fs = new NodeFileSystem();
  const config = await loadConfig({ fs });

  // Node
  const major = Number(process.versions.node.split('.')[0]);
  checks.push({
    name: 'Node.js',
    status: major >= 20 ? 'ok' : 'error',
    message: major >= 20 ? process.version : `${process.version} (20 or newer required)`,
  });

  // Input hook
  try {
    await import('uiohook-napi');
    checks.push({ name: 'Input hook', status: 'ok', message: 'uiohook-napi loaded' });
  } catch (error) {
    checks.push({ name: 'Input hook', status: 'error', message: errorMessage(error) });
  }

  // Synthesizer
  try {
    const { stdout } = await execaCommand('xdotool version');
    checks.push({ name: 'xdotool', status: 'ok', message: stdout.split('\n')[0] ?? 'found' });
  } catch {
    checks.push({ name: 'xdotool', status: 'error', message: 'Not found (needed for play, shell and remap)' });
  }

  // Clipboard
  const [copyTool] = clipboardCommands(process.platform).copy;
  try {
    await execaCommand(`command -v ${copyTool}`, { shell: true });
    checks.push({ name: 'Clipboard', status: 'ok', message: copyTool });
  } catch {
    checks.push({ name: 'Clipboard', status: 'warn', message: `${copyTool} not found (code blocks cannot be pasted)` });
  }

  // Recordings
  const recordings = await fs.listDirs(config.recordingsDir);
  if (recordings.length > 0) {
    checks.push({ name: 'Recordings', status: 'ok', message: `${recordings.length} in ${config.recordingsDir}` });
  } else {
    checks.push({ name: 'Recordings', status: 'warn', message: 'None yet (run mimic record)' });
  }

  // Display results
  for (const check of checks) {
    const icon =
      check.status === 'ok' ? colors.success('✓') :
      check.status === 'warn' ? colors.warn('!') :
      colors.error('✗');
    console.log(`  ${icon} ${check.name.padEnd(15)} ${check.message}`);
  }

  const errors = checks.filter((c) => c.status === 'error');
  console.log('');
  if (errors.length === 0) {
    console.log(colors.success('All good!'));
  } else {
    console.log(colors.warn(`${errors.length} problem(s) found.`));
    process.exitCode = 1;
  }
}
