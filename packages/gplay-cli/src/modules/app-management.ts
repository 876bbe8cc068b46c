import { Command } from "commander";
import type { Services } from "../lib/services.js";
import { appPath } from "../lib/edits.js";
import { addRestCommands, type IdFlag, type PathArgs, type RestCommandSpec } from "../lib/rest-command.js";

const CONFIG: IdFlag = { flag: "--config-id", description: "device tier config ID" };
const RECOVERY: IdFlag = { flag: "--recovery-id", description: "app recovery action ID" };

const recoveries = ({ packageName }: PathArgs, ...rest: string[]) =>
  appPath(packageName, "appRecoveries", ...rest);

export const DEVICE_TIER_COMMANDS: RestCommandSpec[] = [
  {
    name: "list",
    description: "List device tier configs",
    method: "GET",
    path: ({ packageName }) => appPath(packageName, "deviceTierConfigs"),
    paginate: { items: "deviceTierConfigs" },
  },
  {
    name: "get",
    description: "Get a device tier config",
    method: "GET",
    ids: [CONFIG],
    path: (a) => appPath(a.packageName, "deviceTierConfigs", a.id(CONFIG.flag)),
  },
  {
    name: "create",
    description: "Create a device tier config",
    method: "POST",
    path: ({ packageName }) => appPath(packageName, "deviceTierConfigs"),
    body: { description: "DeviceTierConfig", required: true },
    query: [
      {
        flag: "--allow-unknown-devices",
        param: "allowUnknownDevices",
        kind: "boolean",
        description: "allow device groups that match no known device",
      },
    ],
  },
];

export const RECOVERY_COMMANDS: RestCommandSpec[] = [
  {
    name: "list",
    description: "List app recovery actions",
    method: "GET",
    path: (a) => recoveries(a),
    query: [{ flag: "--version-code", param: "versionCode", kind: "int", description: "only this version code" }],
  },
  {
    name: "create",
    description: "Create a draft app recovery action",
    method: "POST",
    path: (a) => recoveries(a),
    body: { description: "CreateDraftAppRecoveryRequest", required: true },
  },
  {
    name: "deploy",
    description: "Deploy an app recovery action",
    method: "POST",
    ids: [RECOVERY],
    path: (a) => `${recoveries(a, a.id(RECOVERY.flag))}:deploy`,
    buildBody: () => ({}),
    confirm: "deploy an app recovery action",
  },
  {
    name: "cancel",
    description: "Cancel an app recovery action",
    method: "POST",
    ids: [RECOVERY],
    path: (a) => `${recoveries(a, a.id(RECOVERY.flag))}:cancel`,
    buildBody: () => ({}),
  },
  {
    name: "add-targeting",
    description: "Extend the targeting of an app recovery action",
    method: "POST",
    ids: [RECOVERY],
    path: (a) => `${recoveries(a, a.id(RECOVERY.flag))}:addTargeting`,
    body: { description: "AddTargetingRequest", required: true },
  },
];

export const DATA_SAFETY_COMMANDS: RestCommandSpec[] = [
  {
    name: "update",
    description: "Upload the data safety form",
    method: "POST",
    path: ({ packageName }) => appPath(packageName, "dataSafety"),
    body: { description: "SafetyLabelsUpdateRequest, e.g. {\"safetyLabels\":\"<csv>\"}", required: true },
  },
];

export function registerAppManagementCommands(program: Command, services: Services): void {
  addRestCommands(
    program.command("devicetiers").description("Device tier configs for device-targeted assets"),
    services,
    DEVICE_TIER_COMMANDS
  );
  addRestCommands(
    program.command("recovery").description("App recovery actions for broken releases"),
    services,
    RECOVERY_COMMANDS
  );
  addRestCommands(
    program.command("datasafety").description("Data safety declarations"),
    services,
    DATA_SAFETY_COMMANDS
  );
}
