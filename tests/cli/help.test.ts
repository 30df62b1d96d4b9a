import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { execFileSync } from 'node:child_process';

function cli(...args: string[]): string {
  return execFileSync(process.execPath, ['--import', 'tsx', 'src/index.ts', ...args], { encoding: 'utf8' });
}

describe('revharvest CLI', () => {
  it('shows help text', () => {
    const output = cli('--help');
    assert.ok(output.includes('revharvest'));
    assert.ok(output.includes('run'));
    assert.ok(output.includes('init'));
    assert.ok(output.includes('status'));
  });

  it('shows version', () => {
    assert.equal(cli('--version').trim(), '0.1.0');
  });

  it('documents the run options', () => {
    const output = cli('run', '--help');
    assert.ok(output.includes('--dry-run'));
    assert.ok(output.includes('--lookback <days>'));
  });
});
