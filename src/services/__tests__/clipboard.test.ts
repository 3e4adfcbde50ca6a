import { describe, it, expect, beforeAll, afterAll, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Clipboard } from '../clipboard.js';
import { CommandRunner } from '../../utils/command.js';

describe('Clipboard', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'devmon-clip-'));
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('should pipe the text into the configured command without holding its stdout', () => {
    const run = jest.fn<CommandRunner>(() => ({ status: 0, stdout: '' }));
    const clipboard = new Clipboard('xclip -selection clipboard', 500, run);

    expect(clipboard.copyToClipboard('panic: boom')).toBe(true);
    expect(run).toHaveBeenCalledWith('xclip', ['-selection', 'clipboard'], { input: 'panic: boom', timeoutMs: 500, stdout: 'ignore' });
  });

  it('should fail when the command exits non-zero', () => {
    const clipboard = new Clipboard('xclip -selection clipboard', 500, () => ({ status: 1, stdout: '' }));

    expect(clipboard.copyToClipboard('panic: boom')).toBe(false);
  });

  it('should fail when the command cannot be run', () => {
    const clipboard = new Clipboard('wl-copy', 500, () => null);

    expect(clipboard.copyToClipboard('panic: boom')).toBe(false);
  });

  it('should save the error to a file', () => {
    const clipboard = new Clipboard('xclip', 500, () => null);
    const filePath = path.join(dir, 'last-error.txt');

    expect(clipboard.saveErrorToFile('panic: boom\n\tat main.go', filePath)).toBe(true);
    expect(fs.readFileSync(filePath, 'utf-8')).toBe('panic: boom\n\tat main.go');
  });

  it('should report a failed save', () => {
    const clipboard = new Clipboard('xclip', 500, () => null);

    expect(clipboard.saveErrorToFile('panic: boom', path.join(dir, 'no', 'such', 'dir.txt'))).toBe(false);
  });
});
