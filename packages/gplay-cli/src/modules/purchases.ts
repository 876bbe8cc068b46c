import { Command } from "commander";
import type { Services } from "../lib/services.js";
import { appPath } from "../lib/edits.js";
import { missingFlag } from "../lib/errors/catalog.js";
import { readJsonArg } from "../lib/json-arg.js";
import { addRestCommands, type IdFlag, type PathArgs, type RestCommandSpec } from "../lib/rest-command.js";

const ORDER: IdFlag = { flag: "--order-id", description: "order ID, e.g. GPA.1234-5678-9012-34567" };
const PRODUCT: IdFlag = { flag: "--product-id", description: "product ID (SKU)" };
const SUBSCRIPTION: IdFlag = { flag: "--subscription-id", description: "subscription ID" };
const TOKEN: IdFlag = { flag: "--token", description: "purchase token" };
const EXTERNAL_TX: IdFlag = {
  flag: "--external-transaction-id",
  description: "external transaction ID from your system",
};

const purchases = ({ packageName }: PathArgs, ...rest: string[]) =>
  appPath(packageName, "purchases", ...rest);

const productToken = (a: PathArgs) =>
  purchases(a, "products", a.id(PRODUCT.flag), "tokens", a.id(TOKEN.flag));

const subscriptionToken = (a: PathArgs) =>
  purchases(a, "subscriptions", a.id(SUBSCRIPTION.flag), "tokens", a.id(TOKEN.flag));

const externalTx = ({ packageName }: PathArgs, ...rest: string[]) =>
  appPath(packageName, "externalTransactions", ...rest);

export const ORDER_COMMANDS: RestCommandSpec[] = [
  {
    name: "get",
    description: "Get an order",
    method: "GET",
    ids: [ORDER],
    path: (a) => appPath(a.packageName, "orders", a.id(ORDER.flag)),
  },
  {
    name: "batch-get",
    description: "Get several orders",
    method: "GET",
    path: ({ packageName }) => `${appPath(packageName, "orders")}:batchGet`,
    query: [
      { flag: "--order-ids", param: "orderIds", kind: "csv", description: "comma-separated order IDs", required: true },
    ],
  },
  {
    name: "refund",
    description: "Refund an order",
    method: "POST",
    ids: [ORDER],
    path: (a) => `${appPath(a.packageName, "orders", a.id(ORDER.flag))}:refund`,
    query: [{ flag: "--revoke", param: "revoke", kind: "boolean", description: "also revoke the entitlement" }],
    confirm: "refund an order",
  },
];

const PRODUCT_PURCHASE_COMMANDS: RestCommandSpec[] = [
  {
    name: "get",
    description: "Get a product purchase",
    method: "GET",
    ids: [PRODUCT, TOKEN],
    path: productToken,
  },
  {
    name: "acknowledge",
    description: "Acknowledge a product purchase",
    method: "POST",
    ids: [PRODUCT, TOKEN],
    path: (a) => `${productToken(a)}:acknowledge`,
    options: [{ flag: "--developer-payload", description: "payload to attach to the purchase" }],
    buildBody: ({ value }) => {
      const payload = value("--developer-payload");
      return payload !== undefined ? { developerPayload: payload } : {};
    },
  },
  {
    name: "consume",
    description: "Consume a product purchase",
    method: "POST",
    ids: [PRODUCT, TOKEN],
    path: (a) => `${productToken(a)}:consume`,
  },
];

const PRODUCT_V2_COMMANDS: RestCommandSpec[] = [
  {
    name: "get",
    description: "Get a product purchase (v2)",
    method: "GET",
    ids: [TOKEN],
    path: (a) => purchases(a, "productsv2", "tokens", a.id(TOKEN.flag)),
  },
];

const SUBSCRIPTION_PURCHASE_COMMANDS: RestCommandSpec[] = [
  {
    name: "get",
    description: "Get a subscription purchase",
    method: "GET",
    ids: [SUBSCRIPTION, TOKEN],
    path: subscriptionToken,
  },
  {
    name: "cancel",
    description: "Cancel a subscription purchase",
    method: "POST",
    ids: [SUBSCRIPTION, TOKEN],
    path: (a) => `${subscriptionToken(a)}:cancel`,
    confirm: "cancel a subscription",
  },
  {
    name: "defer",
    description: "Defer the renewal of a subscription purchase",
    method: "POST",
    ids: [SUBSCRIPTION, TOKEN],
    path: (a) => `${subscriptionToken(a)}:defer`,
    options: [{ flag: "--json", description: "DeferralInfo JSON (or @file)" }],
    buildBody: ({ value }) => {
      const raw = value("--json");
      if (raw === undefined) throw missingFlag("--json");
      return { deferralInfo: readJsonArg(raw) };
    },
  },
  {
    name: "revoke",
    description: "Refund and revoke a subscription purchase",
    method: "POST",
    ids: [SUBSCRIPTION, TOKEN],
    path: (a) => `${subscriptionToken(a)}:revoke`,
    confirm: "revoke a subscription",
  },
];

const SUBSCRIPTION_V2_COMMANDS: RestCommandSpec[] = [
  {
    name: "get",
    description: "Get a subscription purchase (v2)",
    method: "GET",
    ids: [TOKEN],
    path: (a) => purchases(a, "subscriptionsv2", "tokens", a.id(TOKEN.flag)),
  },
  {
    name: "revoke",
    description: "Revoke a subscription purchase (v2)",
    method: "POST",
    ids: [TOKEN],
    path: (a) => `${purchases(a, "subscriptionsv2", "tokens", a.id(TOKEN.flag))}:revoke`,
    body: { description: "RevokeSubscriptionPurchaseRequest", required: false },
    confirm: "revoke a subscription",
  },
];

const VOIDED_COMMANDS: RestCommandSpec[] = [
  {
    name: "list",
    description: "List voided purchases",
    method: "GET",
    path: (a) => purchases(a, "voidedpurchases"),
    query: [
      { flag: "--start-time", param: "startTime", kind: "int", description: "start, in milliseconds since epoch" },
      { flag: "--end-time", param: "endTime", kind: "int", description: "end, in milliseconds since epoch" },
      { flag: "--max-results", param: "maxResults", kind: "int", description: "results per page", defaultValue: "100" },
      { flag: "--type", param: "type", kind: "int", description: "0 = in-app and subscriptions, 1 = also partial refunds" },
      {
        flag: "--include-quantity",
        param: "includeQuantityBasedPartialRefund",
        kind: "boolean",
        description: "include quantity-based partial refunds",
      },
    ],
    paginate: { items: "voidedPurchases", tokenParam: "token" },
  },
];

export const EXTERNAL_TX_COMMANDS: RestCommandSpec[] = [
  {
    name: "create",
    description: "Report an external transaction",
    method: "POST",
    path: (a) => externalTx(a),
    query: [
      {
        flag: EXTERNAL_TX.flag,
        param: "externalTransactionId",
        kind: "string",
        description: EXTERNAL_TX.description,
        required: true,
      },
    ],
    body: { description: "ExternalTransaction", required: true },
  },
  {
    name: "get",
    description: "Get an external transaction",
    method: "GET",
    ids: [EXTERNAL_TX],
    path: (a) => externalTx(a, a.id(EXTERNAL_TX.flag)),
  },
  {
    name: "refund",
    description: "Refund an external transaction",
    method: "POST",
    ids: [EXTERNAL_TX],
    path: (a) => `${externalTx(a, a.id(EXTERNAL_TX.flag))}:refund`,
    body: { description: "RefundExternalTransactionRequest", required: true },
    confirm: "refund an external transaction",
  },
];

export function registerPurchasesCommands(program: Command, services: Services): void {
  addRestCommands(
    program.command("orders").description("Look up and refund orders"),
    services,
    ORDER_COMMANDS
  );

  const purchasesCmd = program.command("purchases").description("Verify and manage purchases");
  const groups: Array<[string, string, RestCommandSpec[]]> = [
    ["products", "One-time product purchases", PRODUCT_PURCHASE_COMMANDS],
    ["productsv2", "One-time product purchases (v2)", PRODUCT_V2_COMMANDS],
    ["subscriptions", "Subscription purchases", SUBSCRIPTION_PURCHASE_COMMANDS],
    ["subscriptionsv2", "Subscription purchases (v2)", SUBSCRIPTION_V2_COMMANDS],
    ["voided", "Voided purchases", VOIDED_COMMANDS],
  ];
  for (const [name, description, specs] of groups) {
    addRestCommands(purchasesCmd.command(name).description(description), services, specs);
  }

  addRestCommands(
    program.command("externaltx").description("External transactions (alternative billing)"),
    services,
    EXTERNAL_TX_COMMANDS
  );
}
