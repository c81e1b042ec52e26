/**
 * Tool types and collaborator ports
 */

import type { Capability, ToolSchema } from '@tagwire/directive-contracts';
import type { TodoSessionManager } from '@tagwire/directive-core';

/**
 * Tool registration: schema plus the capability bound to its tag
 */
export interface DirectiveTool {
  schema: ToolSchema;
  capability: Capability;
}

/**
 * Browser automation collaborator. Control itself lives outside this package.
 */
export interface BrowserDriver {
  navigate(url: string, signal: AbortSignal): Promise<BrowserState>;
  clickElement(index: number, signal: AbortSignal): Promise<BrowserState>;
  inputText(index: number, text: string, signal: AbortSignal): Promise<BrowserState>;
  clickCoordinates(x: number, y: number, signal: AbortSignal): Promise<BrowserState>;
  goBack(signal: AbortSignal): Promise<BrowserState>;
}

export interface BrowserState {
  url: string;
  title?: string;
  /** Short description of what the action did, shown to the model */
  message?: string;
}

export interface SearchResult {
  title: string;
  url: string;
  snippet?: string;
}

/**
 * Web search collaborator
 */
export interface SearchProvider {
  search(query: string, options: { maxResults: number; signal: AbortSignal }): Promise<SearchResult[]>;
}

/**
 * Everything the built-in tools need for one session
 */
export interface ToolContext {
  /** Root that file and command paths are resolved against */
  workingDir: string;
  sessionId: string;
  todo: TodoSessionManager;
  browser?: BrowserDriver;
  search?: SearchProvider;
}
