import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi } from './render';
import { ErrorCode, type CLIErrorView } from '@confsmith/core';

function viewOf(overrides: Partial<CLIErrorView>): CLIErrorView {
  return {
    title: 'Error E200: Config validation failed at /port: must be integer (and 1 more)',
    code: ErrorCode.CONFIG_VALIDATION_FAILED,
    failures: [],
    omittedFailures: 0,
    colors: false,
    terminalWidth: 80,
    ...overrides,
  };
}

describe('renderCLIView', () => {
  it('renders title, location, failures and workaround', () => {
    const out = renderCLIView(
      viewOf({
        location: 'Location: /port',
        failures: ['/port: must be integer', '/host: must be string'],
        omittedFailures: 1,
        workaround: 'Fix the port',
      })
    );

    expect(out).toBe(
      [
        '❌ Error E200: Config validation failed at /port: must be integer (and 1 more)',
        '📍 Location: /port',
        '  - /port: must be integer',
        '  - /host: must be string',
        '  ... and 1 more',
        '💡 Workaround: Fix the port',
      ].join('\n')
    );
  });

  it('applies ANSI colors to the title when enabled', () => {
    const out = renderCLIView(viewOf({ title: 'Error E500: Internal error', colors: true }));

    expect(out.startsWith('\u001B[31m')).toBe(true);
    expect(stripAnsi(out)).toBe('❌ Error E500: Internal error');
  });

  it('wraps the workaround to the terminal width', () => {
    const out = renderCLIView(
      viewOf({
        title: 'Error E210: Expected a mapping',
        workaround: 'Give every extra key a mapping value',
        terminalWidth: 20,
      })
    );

    expect(out.split('\n')).toEqual([
      '❌ Error E210: Expected a mapping',
      '💡 Workaround: Give',
      'every extra key a',
      'mapping value',
    ]);
  });

  it('never wraps failure lines', () => {
    const failure = '/servers/0/listeners/1/address: must match format "ipv4"';
    const out = renderCLIView(viewOf({ failures: [failure], terminalWidth: 20 }));
    expect(out.split('\n')[1]).toBe(`  - ${failure}`);
  });
});
