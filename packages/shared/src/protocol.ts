/**
 * Plugin Protocol Types
 *
 * Defines the line-delimited JSON protocol between a launcher (the driver) and
 * a plugin. One JSON value per line in each direction, UTF-8.
 */

// ============================================================================
// Launcher → Plugin Requests
// ============================================================================

export interface SearchRequest {
  type: "search";
  query: string;
}

export interface ActivateRequest {
  type: "activate";
  /** Index into the result table of the last search */
  id: number;
}

export interface InterruptRequest {
  type: "interrupt";
}

export interface ExitRequest {
  type: "exit";
}

/**
 * A request that decoded cleanly but that the session does not act on
 * (`Complete`, `Context`, `Quit`, `ActivateContext`, or an empty object).
 */
export interface UnrecognizedRequest {
  type: "unrecognized";
  raw: string;
}

export type PluginRequest =
  | SearchRequest
  | ActivateRequest
  | InterruptRequest
  | ExitRequest
  | UnrecognizedRequest;

export type PluginRequestType = PluginRequest["type"];

/** Bare-string requests. Matched before any JSON decoding. */
export const REQUEST_SENTINELS = {
  exit: '"Exit"',
  interrupt: '"Interrupt"',
} as const;

// ============================================================================
// Plugin → Launcher Responses
// ============================================================================

export interface IconSource {
  Name: string;
}

export interface PluginSearchResult {
  id: number;
  name: string;
  description: string;
  /** Omitted entirely (never null) when the result carries no icon hint */
  icon?: IconSource;
}

export interface AppendResponse {
  Append: PluginSearchResult;
}

export type PluginResponse = "Clear" | "Close" | "Finished" | AppendResponse;

// ============================================================================
// Collaborator Contracts
// ============================================================================

/**
 * One item produced by a search provider.
 */
export interface SearchResult {
  /** Passed verbatim to the activation handler when this result is activated */
  name: string;
  /** Display text */
  description: string;
  /** Icon name hint; no icon is sent when empty or absent */
  iconName?: string;
}

/**
 * Emits one result. Settles once the line has been written; providers may
 * await it to respect output back-pressure.
 */
export type AppendResult = (result: SearchResult) => Promise<void>;

/**
 * Search provider. Invoked once per accepted search. Must check `signal`
 * between results and return promptly once it is aborted.
 */
export type SearchHandler = (
  query: string,
  signal: AbortSignal,
  append: AppendResult,
) => Promise<void> | void;

/**
 * Activation handler. Receives the `name` of a previously produced result.
 * Failures are logged by the session and never reach the wire.
 */
export type ActivateHandler = (entry: string) => Promise<void> | void;
