import type { Command } from "commander";
import type { ApiClient, Query } from "./api-client.js";
import type { Services } from "./services.js";
import {
  action,
  parseIntFlag,
  printOutput,
  requireConfirm,
  requireJson,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
} from "./command.js";
import { readJsonArg, parseCsv } from "./json-arg.js";
import { collectPages } from "./pagination.js";
import type { OutputOptions } from "./output/format.js";
import { missingFlag } from "./errors/catalog.js";

/**
 * Declarative commands for the plain REST resources (products, orders,
 * purchases, device tiers and the like): ID flags build the path, --json
 * is the body, and a few flags map onto query parameters.
 */

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface IdFlag {
  /** e.g. "--product-id" */
  flag: string;
  description: string;
}

export interface QueryFlag {
  flag: string;
  param: string;
  description: string;
  kind: "string" | "int" | "boolean" | "csv";
  /** Sent when the flag is not given */
  defaultValue?: string | boolean;
  required?: boolean;
}

export interface PathArgs {
  packageName: string;
  id: (flag: string) => string;
}

export interface BodyArgs extends PathArgs {
  /** Value of one of the command's extra `options` */
  value: (flag: string) => string | undefined;
}

export interface RestCommandSpec {
  name: string;
  description: string;
  method: HttpMethod;
  path: (args: PathArgs) => string;
  ids?: IdFlag[];
  query?: QueryFlag[];
  /** --json request body */
  body?: { description: string; required: boolean };
  /** Extra value flags, read by buildBody */
  options?: IdFlag[];
  /** Body built from flags instead of --json */
  buildBody?: (args: BodyArgs) => unknown;
  /** Refuse to run without --confirm; the text completes "--confirm is required to ..." */
  confirm?: string;
  /** Adds --paginate, following nextPageToken and collecting this field */
  paginate?: { items: string; tokenParam?: string };
  client?: "publisher" | "reporting";
  examples?: string[];
}

type FlagValues = Record<string, unknown>;

/** "--product-id" -> "productId", "--no-auto-convert" -> "autoConvert" */
export function flagKey(flag: string): string {
  return flag
    .replace(/^--(no-)?/, "")
    .replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

function stringFlag(values: FlagValues, flag: string): string | undefined {
  const value = values[flagKey(flag)];
  return typeof value === "string" ? value : undefined;
}

/**
 * Build the query record for a command from its parsed flags.
 */
export function buildQuery(flags: QueryFlag[], values: FlagValues): Query {
  const query: Query = {};
  for (const spec of flags) {
    const raw = values[flagKey(spec.flag)];
    if (spec.kind === "boolean") {
      const value = typeof raw === "boolean" ? raw : spec.defaultValue;
      if (typeof value === "boolean") query[spec.param] = value;
      continue;
    }
    const text = typeof raw === "string" ? raw : typeof spec.defaultValue === "string" ? spec.defaultValue : undefined;
    if (text === undefined) {
      if (spec.required) throw missingFlag(spec.flag);
      continue;
    }
    if (spec.kind === "int") {
      query[spec.param] = parseIntFlag(text, spec.flag);
    } else if (spec.kind === "csv") {
      const items = parseCsv(text);
      if (items.length === 0 && spec.required) throw missingFlag(spec.flag);
      query[spec.param] = items;
    } else {
      query[spec.param] = text.trim();
    }
  }
  return query;
}

function pageItems(page: unknown, field: string): unknown[] {
  if (typeof page !== "object" || page === null || !(field in page)) return [];
  const items: unknown = Reflect.get(page, field);
  return Array.isArray(items) ? items : [];
}

function pageToken(page: unknown): string | undefined {
  if (typeof page !== "object" || page === null) return undefined;
  const direct: unknown = Reflect.get(page, "nextPageToken");
  if (typeof direct === "string") return direct;
  const nested: unknown = Reflect.get(page, "tokenPagination");
  if (typeof nested === "object" && nested !== null) {
    const token: unknown = Reflect.get(nested, "nextPageToken");
    return typeof token === "string" ? token : undefined;
  }
  return undefined;
}

async function send(
  client: ApiClient,
  method: HttpMethod,
  path: string,
  body: unknown,
  query: Query
): Promise<unknown> {
  switch (method) {
    case "GET":
      return client.get<unknown>(path, { query });
    case "POST":
      return client.post<unknown>(path, body, { query });
    case "PUT":
      return client.put<unknown>(path, body, { query });
    case "PATCH":
      return client.patch<unknown>(path, body, { query });
    case "DELETE":
      return client.delete<unknown>(path, { query });
  }
}

/**
 * Register one REST command under `parent`.
 */
export function addRestCommand(parent: Command, services: Services, spec: RestCommandSpec): Command {
  const cmd = withCommonOptions(parent.command(spec.name).description(spec.description));
  for (const id of spec.ids ?? []) {
    cmd.option(`${id.flag} <value>`, id.description);
  }
  for (const extra of spec.options ?? []) {
    cmd.option(`${extra.flag} <value>`, extra.description);
  }
  for (const q of spec.query ?? []) {
    if (q.kind === "boolean") {
      cmd.option(q.flag, q.description);
    } else {
      cmd.option(`${q.flag} <value>`, q.description);
    }
  }
  if (spec.body) {
    cmd.option("--json <json>", `${spec.body.description} (JSON or @file)`);
  }
  if (spec.confirm) {
    cmd.option("--confirm", "confirm the operation");
  }
  if (spec.paginate) {
    cmd.option("--paginate", "fetch every page");
  }
  if (spec.examples?.length) {
    cmd.addHelpText("after", `\nExamples:\n${spec.examples.map((e) => `  ${e}`).join("\n")}\n`);
  }

  cmd.action(
    action(async (values: FlagValues) => {
      const output: OutputOptions = {
        output: stringFlag(values, "--output"),
        pretty: values.pretty === true,
      };
      validateOutputOptions(output);
      const ids = new Map<string, string>();
      for (const id of spec.ids ?? []) {
        ids.set(id.flag, requireOption(stringFlag(values, id.flag), id.flag));
      }
      const query = buildQuery(spec.query ?? [], values);
      let body: unknown;
      if (spec.body) {
        const raw = stringFlag(values, "--json");
        body = spec.body.required ? requireJson(raw) : raw !== undefined ? readJsonArg(raw) : undefined;
      }
      if (spec.confirm) {
        requireConfirm(values.confirm === true, spec.confirm);
      }

      const packageName = requirePackage(services, stringFlag(values, "--package"));
      const pathArgs: PathArgs = { packageName, id: (flag) => ids.get(flag) ?? "" };
      const path = spec.path(pathArgs);
      if (spec.buildBody) {
        body = spec.buildBody({ ...pathArgs, value: (flag) => stringFlag(values, flag) });
      }
      const client = spec.client === "reporting" ? services.reporting : services.publisher;

      if (spec.paginate && values.paginate === true) {
        const field = spec.paginate.items;
        const tokenParam = spec.paginate.tokenParam ?? "pageToken";
        const all = await collectPages(
          (token) => client.get<unknown>(path, { query: { ...query, [tokenParam]: token } }),
          { items: (page) => pageItems(page, field), nextToken: pageToken }
        );
        printOutput({ [field]: all }, output);
        return;
      }

      const result = await send(client, spec.method, path, body, query);
      if (spec.method === "DELETE") {
        const deleted = Object.fromEntries([...ids].map(([flag, value]) => [flagKey(flag), value]));
        printOutput({ ...deleted, deleted: true }, output);
        return;
      }
      printOutput(result, output);
    })
  );
  return cmd;
}

export function addRestCommands(parent: Command, services: Services, specs: RestCommandSpec[]): void {
  for (const spec of specs) {
    addRestCommand(parent, services, spec);
  }
}
