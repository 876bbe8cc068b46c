import { Command } from "commander";
import type { playdeveloperreporting_v1beta1 } from "googleapis";
import type { Services } from "../lib/services.js";
import {
  action,
  parseIntFlag,
  printOutput,
  requireChoice,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  type CommonOptions,
} from "../lib/command.js";
import { invalidFlag } from "../lib/errors/catalog.js";
import { parseCsv } from "../lib/json-arg.js";
import { collectPages, nextPageToken } from "../lib/pagination.js";

type GoogleDate = playdeveloperreporting_v1beta1.Schema$GoogleTypeDateTime;
type TimelineSpec = playdeveloperreporting_v1beta1.Schema$GooglePlayDeveloperReportingV1beta1TimelineSpec;
type MetricsRow = playdeveloperreporting_v1beta1.Schema$GooglePlayDeveloperReportingV1beta1MetricsRow;

/** Daily metrics are only served in this time zone. */
export const REPORTING_TIME_ZONE = "America/Los_Angeles";

export interface MetricSet {
  name: string;
  metrics: readonly string[];
  /** Dimensions the API requires for this set */
  requiredDimensions?: readonly string[];
}

export const METRIC_SETS = {
  crash: { name: "crashRateMetricSet", metrics: ["crashRate", "userPerceivedCrashRate", "distinctUsers"] },
  anr: { name: "anrRateMetricSet", metrics: ["anrRate", "userPerceivedAnrRate", "distinctUsers"] },
  startup: { name: "slowStartRateMetricSet", metrics: ["slowStartRate", "distinctUsers"], requiredDimensions: ["startType"] },
  rendering: {
    name: "slowRenderingRateMetricSet",
    metrics: ["slowRenderingRate20Fps", "slowRenderingRate30Fps", "distinctUsers"],
  },
  wakeup: { name: "excessiveWakeupRateMetricSet", metrics: ["excessiveWakeupRate", "distinctUsers"] },
  wakelock: { name: "stuckBackgroundWakelockRateMetricSet", metrics: ["stuckBgWakelockRate", "distinctUsers"] },
} as const satisfies Record<string, MetricSet>;

const CRASH_TYPES = ["crash", "anr"] as const;
const BATTERY_TYPES = ["wakeup", "wakelock"] as const;

type MetricOptions = CommonOptions & {
  type?: string;
  from?: string;
  to?: string;
  dimension?: string;
  pageSize?: string;
  paginate?: boolean;
};

type SearchOptions = CommonOptions & {
  filter?: string;
  orderBy?: string;
  pageSize?: string;
  paginate?: boolean;
};

export interface MetricQuery {
  from?: string;
  to?: string;
  dimensions: string[];
  pageSize?: number;
}

export interface MetricQueryBody {
  timelineSpec: TimelineSpec;
  dimensions: string[];
  metrics: readonly string[];
  pageSize?: number;
  pageToken?: string;
}

interface MetricQueryResponse {
  rows?: MetricsRow[];
  nextPageToken?: string | null;
}

/** `apps/<pkg>` in the Reporting API */
export function reportingApp(packageName: string, resource: string): string {
  return `apps/${encodeURIComponent(packageName)}/${resource}`;
}

/**
 * Parse a YYYY-MM-DD flag into a reporting date in the Pacific time zone.
 */
export function parseReportingDate(value: string, flag: string): GoogleDate {
  const date = value.trim();
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  const invalid = () => invalidFlag(`${flag}: invalid date format: "${date}" (expected YYYY-MM-DD)`);
  if (!match) throw invalid();

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
    throw invalid();
  }
  return { year, month, day, timeZone: { id: REPORTING_TIME_ZONE } };
}

/**
 * Body for `<metricSet>:query` with a daily timeline.
 */
export function buildMetricQuery(set: MetricSet, query: MetricQuery): MetricQueryBody {
  const timelineSpec: TimelineSpec = { aggregationPeriod: "DAILY" };
  if (query.from !== undefined) {
    timelineSpec.startTime = parseReportingDate(query.from, "--from");
  }
  if (query.to !== undefined) {
    timelineSpec.endTime = parseReportingDate(query.to, "--to");
  }
  if (query.from !== undefined && query.to !== undefined && query.from.trim() > query.to.trim()) {
    throw invalidFlag(`--from (${query.from.trim()}) must not be after --to (${query.to.trim()})`);
  }

  const dimensions = [...(set.requiredDimensions ?? [])];
  for (const dimension of query.dimensions) {
    if (!dimensions.includes(dimension)) dimensions.push(dimension);
  }

  return {
    timelineSpec,
    dimensions,
    metrics: [...set.metrics],
    ...(query.pageSize !== undefined ? { pageSize: query.pageSize } : {}),
  };
}

/**
 * Run a metric set query; with `paginate` every page's rows are collected.
 */
export async function queryMetricSet(
  services: Pick<Services, "reporting">,
  packageName: string,
  set: MetricSet,
  body: MetricQueryBody,
  paginate: boolean
): Promise<MetricQueryResponse> {
  const path = `${reportingApp(packageName, set.name)}:query`;
  if (!paginate) {
    return services.reporting.post<MetricQueryResponse>(path, body);
  }
  const rows = await collectPages(
    (pageToken) => services.reporting.post<MetricQueryResponse>(path, { ...body, pageToken }),
    { items: (page) => page.rows, nextToken: nextPageToken }
  );
  return { rows };
}

function withMetricOptions(cmd: Command): Command {
  return withCommonOptions(
    cmd
      .option("--from <date>", "first day, YYYY-MM-DD")
      .option("--to <date>", "last day, YYYY-MM-DD")
      .option("--dimension <names>", "comma-separated dimensions, e.g. versionCode,deviceModel")
      .option("--page-size <n>", "rows per page")
      .option("--paginate", "fetch every page")
  );
}

function metricAction(services: Services, pickSet: (options: MetricOptions) => MetricSet) {
  return action(async (options: MetricOptions) => {
    validateOutputOptions(options);
    const set = pickSet(options);
    const body = buildMetricQuery(set, {
      from: options.from,
      to: options.to,
      dimensions: parseCsv(options.dimension),
      pageSize: options.pageSize !== undefined ? parseIntFlag(options.pageSize, "--page-size") : undefined,
    });
    const packageName = requirePackage(services, options.package);
    const result = await queryMetricSet(services, packageName, set, body, options.paginate === true);
    printOutput(result, options);
  });
}

/**
 * GET a `:search` or list endpoint, optionally following every page.
 */
async function search(
  services: Services,
  path: string,
  items: string,
  query: Record<string, string | number | undefined>,
  paginate: boolean
): Promise<unknown> {
  type Page = Record<string, unknown> & { nextPageToken?: string };
  if (!paginate) {
    return services.reporting.get<Page>(path, { query });
  }
  const all = await collectPages(
    (pageToken) => services.reporting.get<Page>(path, { query: { ...query, pageToken } }),
    {
      items: (page): unknown[] => {
        const value = page[items];
        return Array.isArray(value) ? value : [];
      },
      nextToken: (page) => page.nextPageToken,
    }
  );
  return { [items]: all };
}

function addSearchCommand(
  parent: Command,
  services: Services,
  name: string,
  description: string,
  resource: string,
  items: string,
  orderBy: boolean
): void {
  const cmd = parent
    .command(name)
    .description(description)
    .option("--filter <expr>", "filter expression, e.g. \"versionCode = 123\"");
  if (orderBy) {
    cmd.option("--order-by <field>", "sort order, e.g. \"errorReportCount desc\"");
  }
  withCommonOptions(cmd.option("--page-size <n>", "results per page").option("--paginate", "fetch every page")).action(
    action(async (options: SearchOptions) => {
      validateOutputOptions(options);
      const pageSize = options.pageSize !== undefined ? parseIntFlag(options.pageSize, "--page-size") : undefined;
      const packageName = requirePackage(services, options.package);
      const result = await search(
        services,
        reportingApp(packageName, resource),
        items,
        {
          filter: options.filter?.trim() || undefined,
          orderBy: options.orderBy?.trim() || undefined,
          pageSize,
        },
        options.paginate === true
      );
      printOutput(result, options);
    })
  );
}

export function registerVitalsCommands(program: Command, services: Services): void {
  const vitals = program
    .command("vitals")
    .description("Android vitals from the Play Developer Reporting API");

  const crashes = vitals.command("crashes").description("Crash and ANR rates");
  withMetricOptions(
    crashes
      .command("query")
      .description("Query daily crash or ANR rates")
      .option("--type <type>", "crash or anr", "crash")
  ).action(
    metricAction(services, (options) => METRIC_SETS[requireChoice(options.type?.toLowerCase(), "--type", CRASH_TYPES)])
  );

  const anomalies = vitals.command("anomalies").description("Detected metric anomalies");
  addSearchCommand(anomalies, services, "list", "List anomalies", "anomalies", "anomalies", false);

  const errors = vitals.command("errors").description("Error issues and reports");
  addSearchCommand(errors, services, "issues", "Search error issues", "errorIssues:search", "errorIssues", true);
  addSearchCommand(errors, services, "reports", "Search error reports", "errorReports:search", "errorReports", false);

  const performance = vitals.command("performance").description("Startup, rendering and battery metrics");
  withMetricOptions(performance.command("startup").description("Slow start rates")).action(
    metricAction(services, () => METRIC_SETS.startup)
  );
  withMetricOptions(performance.command("rendering").description("Slow rendering rates")).action(
    metricAction(services, () => METRIC_SETS.rendering)
  );
  withMetricOptions(
    performance
      .command("battery")
      .description("Excessive wakeups or stuck background wake locks")
      .option("--type <type>", "wakeup or wakelock", "wakeup")
  ).action(
    metricAction(services, (options) => METRIC_SETS[requireChoice(options.type?.toLowerCase(), "--type", BATTERY_TYPES)])
  );
}
