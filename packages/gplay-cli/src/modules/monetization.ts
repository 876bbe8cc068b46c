import { Command } from "commander";
import type { Services } from "../lib/services.js";
import { appPath } from "../lib/edits.js";
import { invalidFlag, missingFlag } from "../lib/errors/catalog.js";
import { parseCsv } from "../lib/json-arg.js";
import {
  addRestCommands,
  type IdFlag,
  type PathArgs,
  type QueryFlag,
  type RestCommandSpec,
} from "../lib/rest-command.js";

const SKU: IdFlag = { flag: "--sku", description: "in-app product SKU" };
const PRODUCT: IdFlag = { flag: "--product-id", description: "product ID" };
const BASE_PLAN: IdFlag = { flag: "--base-plan-id", description: "base plan ID" };
const OFFER: IdFlag = { flag: "--offer-id", description: "offer ID" };

const q = (
  flag: string,
  param: string,
  kind: QueryFlag["kind"],
  description: string,
  extra: Partial<QueryFlag> = {}
): QueryFlag => ({ flag, param, kind, description, ...extra });

const UPDATE_MASK = q("--update-mask", "updateMask", "string", "comma-separated fields to update");
const REGIONS_VERSION = q(
  "--regions-version",
  "regionsVersion.version",
  "string",
  "regions version, e.g. 2022/02"
);
const ALLOW_MISSING = q("--allow-missing", "allowMissing", "boolean", "create the resource if it does not exist");
const LATENCY_TOLERANCE = q(
  "--latency-tolerance",
  "latencyTolerance",
  "string",
  "PRODUCT_UPDATE_LATENCY_TOLERANCE_LATENCY_SENSITIVE or ..._LATENCY_TOLERANT"
);
const AUTO_CONVERT = q(
  "--no-auto-convert-prices",
  "autoConvertMissingPrices",
  "boolean",
  "do not convert missing regional prices",
  { defaultValue: true }
);
const PAGE_SIZE = q("--page-size", "pageSize", "int", "results per page", { defaultValue: "100" });

const json = (description: string, required = true) => ({ description, required });

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

const inappproducts = ({ packageName }: PathArgs, ...rest: string[]) =>
  appPath(packageName, "inappproducts", ...rest);

const subscriptions = ({ packageName }: PathArgs, ...rest: string[]) =>
  appPath(packageName, "subscriptions", ...rest);

const basePlans = (args: PathArgs, ...rest: string[]) =>
  subscriptions(args, args.id(PRODUCT.flag), "basePlans", ...rest);

const offers = (args: PathArgs, ...rest: string[]) =>
  basePlans(args, args.id(BASE_PLAN.flag), "offers", ...rest);

const oneTimeProducts = ({ packageName }: PathArgs, ...rest: string[]) =>
  appPath(packageName, "oneTimeProducts", ...rest);

function requireCsv(value: string | undefined, flag: string): string[] {
  const items = parseCsv(value);
  if (items.length === 0) {
    throw missingFlag(flag);
  }
  return items;
}

/**
 * Price for pricing:convertRegionPrices from micros, e.g. 1990000 USD ->
 * { currencyCode: "USD", units: "1", nanos: 990000000 }.
 */
export function moneyFromMicros(micros: string, currency: string) {
  if (!/^\d+$/.test(micros.trim())) {
    throw invalidFlag(`--price-micros must be a positive integer, got: ${micros}`);
  }
  const value = BigInt(micros.trim());
  const code = currency.trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(code)) {
    throw invalidFlag(`--currency must be an ISO 4217 code such as USD, got: ${currency}`);
  }
  return {
    currencyCode: code,
    units: String(value / 1_000_000n),
    nanos: Number(value % 1_000_000n) * 1000,
  };
}

// ---------------------------------------------------------------------------
// Specs
// ---------------------------------------------------------------------------

export const IAP_COMMANDS: RestCommandSpec[] = [
  {
    name: "list",
    description: "List in-app products",
    method: "GET",
    path: (a) => inappproducts(a),
    query: [q("--max-results", "maxResults", "int", "results per page", { defaultValue: "100" })],
    paginate: { items: "inappproduct", tokenParam: "token" },
  },
  { name: "get", description: "Get an in-app product", method: "GET", ids: [SKU], path: (a) => inappproducts(a, a.id(SKU.flag)) },
  {
    name: "insert",
    description: "Create an in-app product",
    method: "POST",
    path: (a) => inappproducts(a),
    body: json("InAppProduct"),
    query: [AUTO_CONVERT],
  },
  {
    name: "update",
    description: "Replace an in-app product",
    method: "PUT",
    ids: [SKU],
    path: (a) => inappproducts(a, a.id(SKU.flag)),
    body: json("InAppProduct"),
    query: [AUTO_CONVERT, ALLOW_MISSING],
  },
  {
    name: "delete",
    description: "Delete an in-app product",
    method: "DELETE",
    ids: [SKU],
    path: (a) => inappproducts(a, a.id(SKU.flag)),
    confirm: "delete an in-app product",
  },
  {
    name: "batch-get",
    description: "Get several in-app products",
    method: "GET",
    path: (a) => `${inappproducts(a)}:batchGet`,
    query: [q("--skus", "sku", "csv", "comma-separated SKUs", { required: true })],
  },
  {
    name: "batch-update",
    description: "Create or update several in-app products",
    method: "POST",
    path: (a) => `${inappproducts(a)}:batchUpdate`,
    body: json("InappproductsBatchUpdateRequest"),
  },
  {
    name: "batch-delete",
    description: "Delete several in-app products",
    method: "POST",
    path: (a) => `${inappproducts(a)}:batchDelete`,
    options: [{ flag: "--skus", description: "comma-separated SKUs" }],
    buildBody: ({ packageName, value }) => ({
      requests: requireCsv(value("--skus"), "--skus").map((sku) => ({ packageName, sku })),
    }),
    confirm: "delete in-app products",
  },
];

export const SUBSCRIPTION_COMMANDS: RestCommandSpec[] = [
  {
    name: "list",
    description: "List subscriptions",
    method: "GET",
    path: (a) => subscriptions(a),
    query: [PAGE_SIZE, q("--show-archived", "showArchived", "boolean", "include archived subscriptions")],
    paginate: { items: "subscriptions" },
  },
  {
    name: "get",
    description: "Get a subscription",
    method: "GET",
    ids: [PRODUCT],
    path: (a) => subscriptions(a, a.id(PRODUCT.flag)),
  },
  {
    name: "create",
    description: "Create a subscription",
    method: "POST",
    path: (a) => subscriptions(a),
    body: json("Subscription"),
    query: [
      q("--product-id", "productId", "string", "ID of the new subscription", { required: true }),
      REGIONS_VERSION,
    ],
  },
  {
    name: "patch",
    description: "Update a subscription",
    method: "PATCH",
    ids: [PRODUCT],
    path: (a) => subscriptions(a, a.id(PRODUCT.flag)),
    body: json("Subscription"),
    query: [UPDATE_MASK, REGIONS_VERSION, ALLOW_MISSING, LATENCY_TOLERANCE],
  },
  {
    name: "delete",
    description: "Delete a subscription",
    method: "DELETE",
    ids: [PRODUCT],
    path: (a) => subscriptions(a, a.id(PRODUCT.flag)),
    confirm: "delete a subscription",
  },
  {
    name: "archive",
    description: "Archive a subscription",
    method: "POST",
    ids: [PRODUCT],
    path: (a) => `${subscriptions(a, a.id(PRODUCT.flag))}:archive`,
    buildBody: () => ({}),
  },
];

export const BASE_PLAN_COMMANDS: RestCommandSpec[] = [
  ...(["activate", "deactivate"] as const).map(
    (verb): RestCommandSpec => ({
      name: verb,
      description: `${verb === "activate" ? "Activate" : "Deactivate"} a base plan`,
      method: "POST",
      ids: [PRODUCT, BASE_PLAN],
      path: (a) => `${basePlans(a, a.id(BASE_PLAN.flag))}:${verb}`,
      buildBody: () => ({}),
    })
  ),
  {
    name: "delete",
    description: "Delete a base plan",
    method: "DELETE",
    ids: [PRODUCT, BASE_PLAN],
    path: (a) => basePlans(a, a.id(BASE_PLAN.flag)),
    confirm: "delete a base plan",
  },
  {
    name: "migrate-prices",
    description: "Migrate subscribers of a base plan to the current prices",
    method: "POST",
    ids: [PRODUCT, BASE_PLAN],
    path: (a) => `${basePlans(a, a.id(BASE_PLAN.flag))}:migratePrices`,
    body: json("MigrateBasePlanPricesRequest"),
  },
  {
    name: "batch-migrate-prices",
    description: "Migrate prices of several base plans",
    method: "POST",
    ids: [PRODUCT],
    path: (a) => `${basePlans(a)}:batchMigratePrices`,
    body: json("BatchMigrateBasePlanPricesRequest"),
  },
  {
    name: "batch-update-states",
    description: "Activate or deactivate several base plans",
    method: "POST",
    ids: [PRODUCT],
    path: (a) => `${basePlans(a)}:batchUpdateStates`,
    body: json("BatchUpdateBasePlanStatesRequest"),
  },
];

export const OFFER_COMMANDS: RestCommandSpec[] = [
  {
    name: "list",
    description: "List offers of a base plan (use - as base plan ID for all)",
    method: "GET",
    ids: [PRODUCT, BASE_PLAN],
    path: (a) => offers(a),
    query: [PAGE_SIZE],
    paginate: { items: "subscriptionOffers" },
  },
  {
    name: "get",
    description: "Get an offer",
    method: "GET",
    ids: [PRODUCT, BASE_PLAN, OFFER],
    path: (a) => offers(a, a.id(OFFER.flag)),
  },
  {
    name: "create",
    description: "Create an offer",
    method: "POST",
    ids: [PRODUCT, BASE_PLAN],
    path: (a) => offers(a),
    body: json("SubscriptionOffer"),
    query: [q("--offer-id", "offerId", "string", "ID of the new offer", { required: true }), REGIONS_VERSION],
  },
  {
    name: "patch",
    description: "Update an offer",
    method: "PATCH",
    ids: [PRODUCT, BASE_PLAN, OFFER],
    path: (a) => offers(a, a.id(OFFER.flag)),
    body: json("SubscriptionOffer"),
    query: [UPDATE_MASK, REGIONS_VERSION, ALLOW_MISSING, LATENCY_TOLERANCE],
  },
  {
    name: "delete",
    description: "Delete an offer",
    method: "DELETE",
    ids: [PRODUCT, BASE_PLAN, OFFER],
    path: (a) => offers(a, a.id(OFFER.flag)),
    confirm: "delete an offer",
  },
  ...(["activate", "deactivate"] as const).map(
    (verb): RestCommandSpec => ({
      name: verb,
      description: `${verb === "activate" ? "Activate" : "Deactivate"} an offer`,
      method: "POST",
      ids: [PRODUCT, BASE_PLAN, OFFER],
      path: (a) => `${offers(a, a.id(OFFER.flag))}:${verb}`,
      buildBody: () => ({}),
    })
  ),
  {
    name: "batch-get",
    description: "Get several offers",
    method: "POST",
    ids: [PRODUCT, BASE_PLAN],
    path: (a) => `${offers(a)}:batchGet`,
    options: [{ flag: "--offer-ids", description: "comma-separated offer IDs" }],
    buildBody: ({ packageName, id, value }) => ({
      requests: requireCsv(value("--offer-ids"), "--offer-ids").map((offerId) => ({
        packageName,
        productId: id(PRODUCT.flag),
        basePlanId: id(BASE_PLAN.flag),
        offerId,
      })),
    }),
  },
  {
    name: "batch-update",
    description: "Update several offers",
    method: "POST",
    ids: [PRODUCT, BASE_PLAN],
    path: (a) => `${offers(a)}:batchUpdate`,
    body: json("BatchUpdateSubscriptionOffersRequest"),
  },
  {
    name: "batch-update-states",
    description: "Activate or deactivate several offers",
    method: "POST",
    ids: [PRODUCT, BASE_PLAN],
    path: (a) => `${offers(a)}:batchUpdateStates`,
    body: json("BatchUpdateSubscriptionOfferStatesRequest"),
  },
];

export const ONE_TIME_PRODUCT_COMMANDS: RestCommandSpec[] = [
  {
    name: "list",
    description: "List one-time products",
    method: "GET",
    path: (a) => oneTimeProducts(a),
    query: [PAGE_SIZE],
    paginate: { items: "oneTimeProducts" },
  },
  {
    name: "get",
    description: "Get a one-time product",
    method: "GET",
    ids: [PRODUCT],
    path: (a) => oneTimeProducts(a, a.id(PRODUCT.flag)),
  },
  {
    name: "patch",
    description: "Create or update a one-time product",
    method: "PATCH",
    ids: [PRODUCT],
    path: (a) => oneTimeProducts(a, a.id(PRODUCT.flag)),
    body: json("OneTimeProduct"),
    query: [UPDATE_MASK, REGIONS_VERSION, ALLOW_MISSING, LATENCY_TOLERANCE],
  },
  {
    name: "delete",
    description: "Delete a one-time product",
    method: "DELETE",
    ids: [PRODUCT],
    path: (a) => oneTimeProducts(a, a.id(PRODUCT.flag)),
    query: [LATENCY_TOLERANCE],
    confirm: "delete a one-time product",
  },
  {
    name: "batch-get",
    description: "Get several one-time products",
    method: "GET",
    path: (a) => `${oneTimeProducts(a)}:batchGet`,
    query: [q("--product-ids", "productIds", "csv", "comma-separated product IDs", { required: true })],
  },
  {
    name: "batch-update",
    description: "Create or update several one-time products",
    method: "POST",
    path: (a) => `${oneTimeProducts(a)}:batchUpdate`,
    body: json("BatchUpdateOneTimeProductsRequest"),
  },
  {
    name: "batch-delete",
    description: "Delete several one-time products",
    method: "POST",
    path: (a) => `${oneTimeProducts(a)}:batchDelete`,
    body: json("BatchDeleteOneTimeProductsRequest"),
    confirm: "delete one-time products",
  },
];

export const PRICING_COMMANDS: RestCommandSpec[] = [
  {
    name: "convert",
    description: "Convert a price into every region's local currency",
    method: "POST",
    path: ({ packageName }) => `${appPath(packageName, "pricing")}:convertRegionPrices`,
    options: [
      { flag: "--price-micros", description: "price in micros, e.g. 1990000 for 1.99" },
      { flag: "--currency", description: "currency code, e.g. USD" },
    ],
    buildBody: ({ value }) => {
      const micros = value("--price-micros");
      const currency = value("--currency");
      if (micros === undefined) throw missingFlag("--price-micros");
      if (currency === undefined) throw missingFlag("--currency");
      return { price: moneyFromMicros(micros, currency) };
    },
    examples: ["gplay pricing convert --package com.example.app --price-micros 1990000 --currency USD"],
  },
];

export function registerMonetizationCommands(program: Command, services: Services): void {
  const groups: Array<[string, string, RestCommandSpec[]]> = [
    ["iap", "Manage legacy in-app products", IAP_COMMANDS],
    ["subscriptions", "Manage subscriptions", SUBSCRIPTION_COMMANDS],
    ["baseplans", "Manage subscription base plans", BASE_PLAN_COMMANDS],
    ["offers", "Manage subscription offers", OFFER_COMMANDS],
    ["onetimeproducts", "Manage one-time products", ONE_TIME_PRODUCT_COMMANDS],
    ["pricing", "Regional price conversion", PRICING_COMMANDS],
  ];
  for (const [name, description, specs] of groups) {
    addRestCommands(program.command(name).description(description), services, specs);
  }
}
