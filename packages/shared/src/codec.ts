import { z } from "zod";
import {
  REQUEST_SENTINELS,
  type PluginRequest,
  type PluginResponse,
  type PluginSearchResult,
} from "./protocol.js";

const u32 = z.number().int().nonnegative().max(0xffffffff);

/**
 * Object-shaped requests. Only `Search` and `Activate` are acted on; other
 * keys (`ActivateContext`, `Complete`, `Context`, `Quit`) pass through
 * unvalidated, and `null` counts as absent.
 */
const requestObjectSchema = z
  .object({
    Search: z.string().nullish(),
    Activate: u32.nullish(),
  })
  .passthrough();

export type DecodeResult =
  | { ok: true; request: PluginRequest }
  | { ok: false; error: string };

/**
 * Decode one input line.
 *
 * Bare sentinels (`"Exit"`, `"Interrupt"`) are matched on the trimmed text
 * first; everything else goes through `JSON.parse` and schema validation.
 * Never throws.
 */
export function decodeRequest(line: string): DecodeResult {
  const trimmed = line.trim();
  if (trimmed === REQUEST_SENTINELS.exit) return { ok: true, request: { type: "exit" } };
  if (trimmed === REQUEST_SENTINELS.interrupt) {
    return { ok: true, request: { type: "interrupt" } };
  }

  let value: unknown;
  try {
    value = JSON.parse(trimmed);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }

  const parsed = requestObjectSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, error: formatIssues(parsed.error) };
  }

  const { Search, Activate } = parsed.data;
  if (Search != null) return { ok: true, request: { type: "search", query: Search } };
  if (Activate != null) return { ok: true, request: { type: "activate", id: Activate } };
  return { ok: true, request: { type: "unrecognized", raw: line } };
}

/**
 * Encode one response as a single line of JSON (no trailing newline).
 */
export function encodeResponse(response: PluginResponse): string {
  if (typeof response === "string") return JSON.stringify(response);

  const { id, name, description, icon } = response.Append;
  const result: PluginSearchResult = { id, name, description };
  if (icon) result.icon = { Name: icon.Name };
  return JSON.stringify({ Append: result });
}

/**
 * Build an `Append` response, dropping the icon when no hint is given.
 */
export function appendResponse(
  id: number,
  name: string,
  description: string,
  iconName?: string,
): PluginResponse {
  const result: PluginSearchResult = { id, name, description };
  if (iconName) result.icon = { Name: iconName };
  return { Append: result };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
