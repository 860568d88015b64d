import { describe, it, expect } from 'vitest';
import * as render from './render.js';
import { renderCLIView } from './render.js';
import { stripAnsi } from './__tests__/ansi.js';
import type { CLIErrorView } from '@semregex/core';
import { ErrorCode } from '@semregex/core';

describe('renderCLIView', () => {
  it('renders title and sections in order', () => {
    const view: CLIErrorView = {
      title: "Error E100: invalid patch version: 'x'",
      code: ErrorCode.VERSION_PARSE_FAILED,
      input: '1.2.x',
      location: 'Component: patch',
      excerpt: 'x',
      workaround: undefined,
      colors: false,
      terminalWidth: 80,
    };

    expect(renderCLIView(view).split('\n')).toEqual([
      "❌ Error E100: invalid patch version: 'x'",
      'Input: 1.2.x',
      '📍 Component: patch',
      'Excerpt: x',
    ]);
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: engine rejected pattern',
      code: ErrorCode.INTERNAL_ERROR,
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);
    expect(out.startsWith('\u001B[31m\u001B[1m')).toBe(true);
    expect(stripAnsi(out)).toBe('❌ Error E500: engine rejected pattern');
  });

  it('wraps sections to the terminal width', () => {
    const view: CLIErrorView = {
      title: 'Error E300: lookahead unsupported',
      code: ErrorCode.DIALECT_FEATURE_UNSUPPORTED,
      workaround: "use the 'negate' not-equal strategy",
      colors: false,
      terminalWidth: 30,
    };
    expect(renderCLIView(view).split('\n')).toEqual([
      '❌ Error E300: lookahead unsupported',
      "💡 Workaround: use the",
      "'negate' not-equal strategy",
    ]);
  });

  it('exposes the renderer as its only export', () => {
    expect(Object.keys(render)).toEqual(['renderCLIView']);
  });
});
