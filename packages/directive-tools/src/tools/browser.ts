/**
 * Browser tools. Each directive is forwarded to the BrowserDriver.
 */

import { integerArg, stringArg, toolError, toolOk } from '@tagwire/directive-contracts';
import type { ToolResult, ToolSchema } from '@tagwire/directive-contracts';
import type { BrowserDriver, BrowserState, DirectiveTool, ToolContext } from '../types.js';

export const browserNavigateToSchema: ToolSchema = {
  tag: 'browser-navigate-to',
  description: 'Open a URL in the browser.',
  bindings: [{ name: 'url', source: 'content', path: '.', required: true, valueType: 'string' }],
  example: '<browser-navigate-to>\nhttps://example.com\n</browser-navigate-to>',
};

export const browserClickElementSchema: ToolSchema = {
  tag: 'browser-click-element',
  description: 'Click the interactive element with the given index.',
  bindings: [{ name: 'index', source: 'content', path: '.', required: true, valueType: 'integer' }],
};

export const browserInputTextSchema: ToolSchema = {
  tag: 'browser-input-text',
  description: 'Type text into the element with the given index.',
  bindings: [
    { name: 'index', source: 'attribute', path: 'index', required: true, valueType: 'integer' },
    { name: 'text', source: 'content', path: '.', required: true, valueType: 'string' },
  ],
};

export const browserClickCoordinatesSchema: ToolSchema = {
  tag: 'browser-click-coordinates',
  description: 'Click at page coordinates.',
  bindings: [
    { name: 'x', source: 'attribute', path: 'x', required: true, valueType: 'integer' },
    { name: 'y', source: 'attribute', path: 'y', required: true, valueType: 'integer' },
  ],
};

export const browserGoBackSchema: ToolSchema = {
  tag: 'browser-go-back',
  description: 'Go back to the previous page.',
  bindings: [],
};

type BrowserAction = (driver: BrowserDriver, signal: AbortSignal) => Promise<BrowserState>;

function stateResult(action: string, state: BrowserState): ToolResult {
  const title = state.title ? ` (${state.title})` : '';
  const lines = [`${action}. Current page: ${state.url}${title}`];
  if (state.message) {
    lines.push(state.message);
  }
  return toolOk(lines.join('\n'), state);
}

async function withBrowser(
  context: ToolContext,
  signal: AbortSignal,
  label: string,
  action: BrowserAction,
): Promise<ToolResult> {
  if (!context.browser) {
    return toolError({
      code: 'BROWSER_UNAVAILABLE',
      message: 'No browser is attached to this session',
      hint: 'Use web-search instead.',
    });
  }
  return stateResult(label, await action(context.browser, signal));
}

/**
 * browser-navigate-to, browser-click-element, browser-input-text,
 * browser-click-coordinates, browser-go-back
 */
export function createBrowserTools(context: ToolContext): DirectiveTool[] {
  return [
    {
      schema: browserNavigateToSchema,
      capability: (args, ctx) => {
        const url = stringArg(args, 'url').trim();
        if (!/^https?:\/\//i.test(url)) {
          return toolError({
            code: 'INVALID_URL',
            message: `Not an http(s) URL: ${url}`,
            hint: 'Include the scheme, e.g. https://',
          });
        }
        return withBrowser(context, ctx.signal, `Navigated to ${url}`, (driver, signal) => driver.navigate(url, signal));
      },
    },
    {
      schema: browserClickElementSchema,
      capability: (args, ctx) => {
        const index = integerArg(args, 'index');
        return withBrowser(context, ctx.signal, `Clicked element ${index}`, (driver, signal) =>
          driver.clickElement(index, signal),
        );
      },
    },
    {
      schema: browserInputTextSchema,
      capability: (args, ctx) => {
        const index = integerArg(args, 'index');
        const text = stringArg(args, 'text');
        return withBrowser(context, ctx.signal, `Typed into element ${index}`, (driver, signal) =>
          driver.inputText(index, text, signal),
        );
      },
    },
    {
      schema: browserClickCoordinatesSchema,
      capability: (args, ctx) => {
        const x = integerArg(args, 'x');
        const y = integerArg(args, 'y');
        return withBrowser(context, ctx.signal, `Clicked at (${x}, ${y})`, (driver, signal) =>
          driver.clickCoordinates(x, y, signal),
        );
      },
    },
    {
      schema: browserGoBackSchema,
      capability: (_args, ctx) =>
        withBrowser(context, ctx.signal, 'Went back', (driver, signal) => driver.goBack(signal)),
    },
  ];
}
