import { describe, it, expect } from '@jest/globals';
import { classifyLine, extractLastError, hasErrorLine, isContinuationLine } from '../error-extractor.js';

function linesOf(text: string): string[] {
  const result = extractLastError(text);
  return result.found ? [...result.block] : [];
}

describe('extractLastError', () => {
  it('should report not found when no line looks like an error', () => {
    const text = ['2024 INFO starting', 'compiled in 120ms', '\tat somewhere', '/tmp/file.go:12'].join('\n');

    expect(extractLastError(text)).toEqual({ found: false });
    expect(extractLastError('')).toEqual({ found: false });
  });

  it('should capture the trigger line and the stack frames after it', () => {
    const text = [
      '2024 INFO starting',
      '2024 ERROR db connection failed',
      '\tat db.Connect',
      '\tat main.run',
      '2024 INFO retrying',
    ].join('\n');

    expect(linesOf(text)).toEqual([
      '2024 ERROR db connection failed',
      '\tat db.Connect',
      '\tat main.run',
    ]);
  });

  it('should keep exactly the trigger plus k continuation lines in file order', () => {
    const text = [
      'panic: nil map',
      '',
      'goroutine 1 [running]:',
      'main.handler()',
      '/home/dev/app/main.go:42 +0x1d',
      'done',
    ].join('\n');

    expect(linesOf(text)).toEqual([
      'panic: nil map',
      '',
      'goroutine 1 [running]:',
      'main.handler()',
      '/home/dev/app/main.go:42 +0x1d',
    ]);
  });

  it('should return only the most recent of two back-to-back errors', () => {
    const text = [
      'Error: first thing broke',
      '\tat first.frame',
      'Error: second thing broke',
      '\tat second.frame',
    ].join('\n');

    expect(linesOf(text)).toEqual(['Error: second thing broke', '\tat second.frame']);
  });

  it('should start a new block on a frame-shaped line that contains a trigger word', () => {
    const text = [
      'ERROR request failed',
      '\tat api.Serve',
      '/path/to/error_handler.go',
      '\tat api.Recover',
    ].join('\n');

    expect(linesOf(text)).toEqual(['/path/to/error_handler.go', '\tat api.Recover']);
  });

  it('should keep an earlier block when later lines are not continuations', () => {
    const text = [
      'FAIL TestLogin',
      '    login_test.go:12: expected 200',
      'ok  	other/pkg',
      'INFO still running',
      '/usr/lib/go/src/runtime/proc.go:250',
    ].join('\n');

    // The indented test line has no tab and is not frame-shaped, so capture stops right away
    expect(linesOf(text)).toEqual(['FAIL TestLogin']);
  });

  it('should match trigger words regardless of case', () => {
    expect(linesOf('something PANICKED here')).toEqual(['something PANICKED here']);
  });

  it('should not add an empty line for the final line terminator', () => {
    expect(linesOf('error: boom\r\n\tat x\r\n')).toEqual(['error: boom', '\tat x']);
  });
});

describe('isContinuationLine', () => {
  it('should accept stack-trace shaped lines', () => {
    expect(isContinuationLine('  /src/app.go:10')).toBe(true);
    expect(isContinuationLine('main.main()')).toBe(true);
    expect(isContinuationLine('runtime.goexit()')).toBe(true);
    expect(isContinuationLine('goroutine 7 [chan receive]:')).toBe(true);
    expect(isContinuationLine('   ')).toBe(true);
    expect(isContinuationLine('created by\tnet/http')).toBe(true);
  });

  it('should reject ordinary log lines', () => {
    expect(isContinuationLine('2024 INFO retrying')).toBe(false);
    expect(isContinuationLine('goroutines: 12')).toBe(false);
  });
});

describe('hasErrorLine', () => {
  it('should flag a tail containing any trigger line', () => {
    expect(hasErrorLine(['ready in 300ms', 'build FAILED'])).toBe(true);
    expect(hasErrorLine(['ready in 300ms', 'watching for changes'])).toBe(false);
    expect(hasErrorLine([])).toBe(false);
  });
});

describe('classifyLine', () => {
  it('should classify lines by the first matching keyword group', () => {
    expect(classifyLine('ERROR: warn about info')).toBe('error');
    expect(classifyLine('WARN slow query')).toBe('warn');
    expect(classifyLine('INFO listening')).toBe('info');
    expect(classifyLine('Building frontend')).toBe('build');
    expect(classifyLine('VITE ready in 200 ms')).toBe('ready');
    expect(classifyLine('[vite] hmr update /src/App.svelte')).toBe('hmr');
    expect(classifyLine('plain output')).toBe('plain');
  });
});
