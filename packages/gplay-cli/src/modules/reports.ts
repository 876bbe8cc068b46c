import { Command } from "commander";
import type { storage_v1 } from "googleapis";
import { basename, join } from "path";
import type { ApiClient } from "../lib/api-client.js";
import type { Services } from "../lib/services.js";
import {
  action,
  printOutput,
  requireChoice,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  withOutputOptions,
  type CommonOptions,
} from "../lib/command.js";
import { invalidFlag } from "../lib/errors/catalog.js";
import { collectPages } from "../lib/pagination.js";
import { logProgress } from "../lib/spinner.js";

type StorageObjects = storage_v1.Schema$Objects;

export const FINANCIAL_TYPES = ["earnings", "sales", "payouts"] as const;
export const STATS_TYPES = ["installs", "ratings", "crashes", "store_performance", "subscriptions"] as const;

export type FinancialType = (typeof FINANCIAL_TYPES)[number];
export type StatsType = (typeof STATS_TYPES)[number];

type ReportOptions = CommonOptions & {
  developer?: string;
  from?: string;
  to?: string;
  type?: string;
  dir: string;
};

export interface ReportObject {
  name: string;
  size: number;
  updated?: string;
}

export interface DownloadedReport {
  name: string;
  path: string;
  size: number;
}

export interface MonthRange {
  from?: string;
  to?: string;
}

/** Reports for a developer account live in this Cloud Storage bucket. */
export function bucketName(developer: string): string {
  return `pubsite_prod_rev_${developer.trim()}`;
}

export function financialPrefix(type: FinancialType): string {
  return `${type}/`;
}

export function statsPrefix(type: StatsType): string {
  return `stats/${type}/`;
}

/** Validate a YYYY-MM month flag. */
export function parseMonth(value: string, flag: string): string {
  const month = value.trim();
  if (!/^\d{4}-(0[1-9]|1[0-2])$/.test(month)) {
    throw invalidFlag(`${flag} must be in YYYY-MM format (got "${month}")`);
  }
  return month;
}

/** The first 20YYMM in a report's object name, e.g. "202601". */
export function reportMonth(name: string): string | undefined {
  return /(20\d{4})/.exec(name)?.[1];
}

/**
 * Whether an object falls inside [from, to]. Names without a month are
 * always included.
 */
export function inMonthRange(name: string, { from, to }: MonthRange): boolean {
  if (from === undefined && to === undefined) return true;
  const month = reportMonth(name);
  if (month === undefined) return true;
  if (from !== undefined && month < from.replace("-", "")) return false;
  if (to !== undefined && month > to.replace("-", "")) return false;
  return true;
}

/** Every object under a prefix, following nextPageToken. */
export async function listReportObjects(
  storage: ApiClient,
  bucket: string,
  prefix: string
): Promise<ReportObject[]> {
  const objects = await collectPages(
    (pageToken) =>
      storage.get<StorageObjects>(`b/${encodeURIComponent(bucket)}/o`, { query: { prefix, pageToken } }),
    { items: (page) => page.items, nextToken: (page) => page.nextPageToken }
  );
  return objects.flatMap((object) =>
    object.name
      ? [
          {
            name: object.name,
            size: Number(object.size ?? 0),
            ...(object.updated ? { updated: object.updated } : {}),
          },
        ]
      : []
  );
}

async function downloadReports(
  storage: ApiClient,
  bucket: string,
  objects: ReportObject[],
  dir: string
): Promise<DownloadedReport[]> {
  const downloaded: DownloadedReport[] = [];
  for (const object of objects) {
    const target = join(dir, basename(object.name));
    logProgress(`Downloading ${object.name}`);
    const result = await storage.download(`b/${encodeURIComponent(bucket)}/o/${encodeURIComponent(object.name)}`, target, {
      query: { alt: "media" },
    });
    downloaded.push({ name: object.name, path: result.path, size: result.size });
  }
  return downloaded;
}

function optionalMonths(options: ReportOptions): MonthRange {
  return {
    from: options.from !== undefined ? parseMonth(options.from, "--from") : undefined,
    to: options.to !== undefined ? parseMonth(options.to, "--to") : undefined,
  };
}

/** --from is required; --to defaults to it. */
function downloadMonths(options: ReportOptions): Required<MonthRange> {
  const from = parseMonth(requireOption(options.from, "--from"), "--from");
  const to = options.to !== undefined ? parseMonth(options.to, "--to") : from;
  return { from, to };
}

/** --type for list commands: one type or "all". */
function listTypes<T extends string>(value: string | undefined, choices: readonly T[]): readonly T[] {
  const choice = requireChoice(value, "--type", [...choices, "all"]);
  return choice === "all" ? choices : choices.filter((type) => type === choice);
}

async function listMatching(
  storage: ApiClient,
  bucket: string,
  prefixes: string[],
  keep: (object: ReportObject) => boolean
): Promise<ReportObject[]> {
  const reports: ReportObject[] = [];
  for (const prefix of prefixes) {
    const objects = await listReportObjects(storage, bucket, prefix);
    reports.push(...objects.filter(keep));
  }
  return reports;
}

export function registerReportsCommands(program: Command, services: Services): void {
  const reports = program
    .command("reports")
    .description("Financial and statistics reports from Cloud Storage");

  const developerHelp = "developer ID from the Cloud Storage URI in Play Console";

  const financial = reports.command("financial").description("Earnings, sales and payouts reports");

  withOutputOptions(
    financial
      .command("list")
      .description("List financial reports")
      .option("--developer <id>", developerHelp)
      .option("--from <month>", "first month, YYYY-MM")
      .option("--to <month>", "last month, YYYY-MM")
      .option("--type <type>", `${FINANCIAL_TYPES.join(", ")} or all`, "all")
  ).action(
    action(async (options: ReportOptions) => {
      validateOutputOptions(options);
      const developer = requireOption(options.developer, "--developer");
      const range = optionalMonths(options);
      const types = listTypes(options.type, FINANCIAL_TYPES);
      const bucket = bucketName(developer);
      const found = await listMatching(services.storage, bucket, types.map(financialPrefix), (object) =>
        inMonthRange(object.name, range)
      );
      printOutput({ developer, bucket, reports: found }, options);
    })
  );

  withOutputOptions(
    financial
      .command("download")
      .description("Download financial reports for a month range")
      .option("--developer <id>", developerHelp)
      .option("--from <month>", "first month, YYYY-MM")
      .option("--to <month>", "last month, YYYY-MM (defaults to --from)")
      .option("--type <type>", FINANCIAL_TYPES.join(", "), "earnings")
      .option("--dir <path>", "directory to write reports to", ".")
  ).action(
    action(async (options: ReportOptions) => {
      validateOutputOptions(options);
      const developer = requireOption(options.developer, "--developer");
      const range = downloadMonths(options);
      const type = requireChoice(options.type, "--type", FINANCIAL_TYPES);
      const bucket = bucketName(developer);
      const matching = await listMatching(services.storage, bucket, [financialPrefix(type)], (object) =>
        inMonthRange(object.name, range)
      );
      const files = await downloadReports(services.storage, bucket, matching, options.dir);
      printOutput({ developer, type, ...range, dir: options.dir, files }, options);
    })
  );

  const stats = reports.command("stats").description("Installs, ratings, crashes and other statistics");

  withCommonOptions(
    stats
      .command("list")
      .description("List statistics reports")
      .option("--developer <id>", developerHelp)
      .option("--from <month>", "first month, YYYY-MM")
      .option("--to <month>", "last month, YYYY-MM")
      .option("--type <type>", `${STATS_TYPES.join(", ")} or all`, "all")
  ).action(
    action(async (options: ReportOptions) => {
      validateOutputOptions(options);
      const developer = requireOption(options.developer, "--developer");
      const range = optionalMonths(options);
      const types = listTypes(options.type, STATS_TYPES);
      const packageName = options.package?.trim() || undefined;
      const bucket = bucketName(developer);
      const found = await listMatching(
        services.storage,
        bucket,
        types.map(statsPrefix),
        (object) =>
          (packageName === undefined || object.name.includes(packageName)) && inMonthRange(object.name, range)
      );
      printOutput({ developer, bucket, reports: found }, options);
    })
  );

  withCommonOptions(
    stats
      .command("download")
      .description("Download one app's statistics reports for a month range")
      .option("--developer <id>", developerHelp)
      .option("--from <month>", "first month, YYYY-MM")
      .option("--to <month>", "last month, YYYY-MM (defaults to --from)")
      .option("--type <type>", STATS_TYPES.join(", "))
      .option("--dir <path>", "directory to write reports to", ".")
  ).action(
    action(async (options: ReportOptions) => {
      validateOutputOptions(options);
      const developer = requireOption(options.developer, "--developer");
      const range = downloadMonths(options);
      const type = requireChoice(options.type, "--type", STATS_TYPES);
      const packageName = requirePackage(services, options.package);
      const bucket = bucketName(developer);
      const matching = await listMatching(
        services.storage,
        bucket,
        [statsPrefix(type)],
        (object) => object.name.includes(packageName) && inMonthRange(object.name, range)
      );
      const files = await downloadReports(services.storage, bucket, matching, options.dir);
      printOutput({ developer, package: packageName, type, ...range, dir: options.dir, files }, options);
    })
  );
}
