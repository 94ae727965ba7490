import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildProgram, main, overridesFromOptions } from './main.js';

describe('CLI', () => {
  describe('buildProgram', () => {
    it('should parse flags into options', () => {
      const program = buildProgram();
      program.parse(['node', 'sysdash', '--no-gpu', '-r', '0.5', '--history', '50', '-c', '/tmp/dash.json']);

      expect(program.opts()).toMatchObject({
        config: '/tmp/dash.json',
        gpu: false,
        refreshRate: 0.5,
        history: 50,
      });
    });

    it('should keep the GPU on by default', () => {
      const program = buildProgram();
      program.parse(['node', 'sysdash']);

      expect(program.opts().gpu).toBe(true);
    });
  });

  describe('overridesFromOptions', () => {
    it('should map flags onto the config file shape', () => {
      expect(
        overridesFromOptions({ config: 'x', gpu: false, network: true, refreshRate: 2, history: 30 }),
      ).toEqual({
        refresh_rate: 2,
        max_history_points: 30,
        display: { show_gpu: false, show_network: true },
      });
    });

    it('should produce no overrides without flags', () => {
      expect(overridesFromOptions({ config: 'x', gpu: true })).toEqual({});
    });
  });

  describe('main --init-config', () => {
    let dir: string;
    let stdout: string[];
    let stderr: string[];

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'sysdash-cli-'));
      stdout = [];
      stderr = [];
      vi.spyOn(process.stdout, 'write').mockImplementation(chunk => {
        stdout.push(String(chunk));
        return true;
      });
      vi.spyOn(process.stderr, 'write').mockImplementation(chunk => {
        stderr.push(String(chunk));
        return true;
      });
    });

    afterEach(() => {
      vi.restoreAllMocks();
      rmSync(dir, { recursive: true, force: true });
    });

    it('should write the effective configuration and exit', async () => {
      const path = join(dir, 'config.json');

      const exitCode = await main(['node', 'sysdash', '--config', path, '--init-config', '--history', '50', '--no-gpu']);

      expect(exitCode).toBe(0);
      expect(stdout).toEqual([`Wrote ${path}\n`]);
      const written = JSON.parse(readFileSync(path, 'utf8'));
      expect(written.max_history_points).toBe(50);
      expect(written.display.show_gpu).toBe(false);
    });

    it('should warn about an invalid flag value and keep the default', async () => {
      const path = join(dir, 'config.json');

      const exitCode = await main(['node', 'sysdash', '--config', path, '--init-config', '--refresh-rate', 'soon']);

      expect(exitCode).toBe(0);
      expect(stderr).toHaveLength(1);
      expect(stderr[0]).toMatch(/^Warning: Invalid config value at refresh_rate: /);
      expect(JSON.parse(readFileSync(path, 'utf8')).refresh_rate).toBe(1);
    });
  });
});
