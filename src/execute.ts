import type { CmdDef } from "./commands.js";
import type { MerakiTransport } from "./client.js";
import { camelCase } from "./commands.js";

export interface ExecuteParams {
  /** Positional path arguments keyed by name (e.g. { networkId: "N_1" }) */
  args: Record<string, string>;
  /** Page size */
  perPage?: string;
  /** Cursor: return items after this one */
  startingAfter?: string;
  /** Cursor: return items before this one */
  endingBefore?: string;
  /** Extra query params (keyed by original param name or its camelCase form) */
  extraQuery?: Record<string, string>;
  /** Request body (already parsed) */
  body?: unknown;
}

export interface ExecuteResult {
  method: string;
  path: string;
  query: Record<string, string>;
  body: unknown | undefined;
}

/** Resolve path template and build query params without executing the request */
export function resolveRequest(cmd: CmdDef, params: ExecuteParams): ExecuteResult {
  let resolvedPath = cmd.path;

  for (const arg of cmd.args) {
    const val = params.args[arg.name];
    if (val) {
      resolvedPath = resolvedPath.replace(`{${arg.name}}`, encodeURIComponent(val));
    }
  }

  const query: Record<string, string> = {};
  if (cmd.paginatable) {
    if (params.perPage !== undefined) query.perPage = params.perPage;
    if (params.startingAfter) query.startingAfter = params.startingAfter;
    if (params.endingBefore) query.endingBefore = params.endingBefore;
  }
  for (const qp of cmd.extraQuery) {
    const val = params.extraQuery?.[qp.name] ?? params.extraQuery?.[camelCase(qp.name)];
    if (val !== undefined) query[qp.name] = val;
  }

  return {
    method: cmd.method,
    path: resolvedPath,
    query,
    body: cmd.hasBody ? params.body : undefined,
  };
}

/** Path placeholders still unresolved after substitution */
export function missingArgs(cmd: CmdDef, params: ExecuteParams): string[] {
  return cmd.args.filter((a) => !params.args[a.name]).map((a) => a.name);
}

/** Execute a single command and return the raw API response */
export async function executeCommand(
  cmd: CmdDef,
  params: ExecuteParams,
  client: MerakiTransport,
): Promise<unknown> {
  const req = resolveRequest(cmd, params);
  return client.request({
    method: req.method,
    path: req.path,
    query: req.query,
    body: req.body,
  });
}

/** Follow Link-header pages for a paginatable command and return every item */
export async function executeAllPages(
  cmd: CmdDef,
  params: ExecuteParams,
  client: MerakiTransport,
  pageSize = 1000,
): Promise<unknown> {
  if (!cmd.paginatable) {
    return executeCommand(cmd, params, client);
  }

  const req = resolveRequest(cmd, { ...params, perPage: undefined, startingAfter: undefined, endingBefore: undefined });
  return client.requestAll({ method: req.method, path: req.path, query: req.query }, pageSize);
}
