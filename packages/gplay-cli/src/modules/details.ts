import { Command } from "commander";
import type { androidpublisher_v3 } from "googleapis";
import type { Services } from "../lib/services.js";
import {
  action,
  printOutput,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  withEditOption,
  type CommonOptions,
  type EditOptions,
} from "../lib/command.js";
import { editPath } from "../lib/edits.js";
import { invalidFlag } from "../lib/errors/catalog.js";
import { readJsonArg } from "../lib/json-arg.js";
import { validateLocale } from "../lib/locales.js";

type AppDetails = androidpublisher_v3.Schema$AppDetails;

type DetailsOptions = CommonOptions &
  EditOptions & {
    contactEmail?: string;
    contactPhone?: string;
    contactWebsite?: string;
    defaultLanguage?: string;
    json?: string;
  };

export function detailsBody(options: DetailsOptions): AppDetails {
  if (options.json !== undefined) {
    const parsed = readJsonArg(options.json);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw invalidFlag("--json must be an AppDetails JSON object");
    }
    return parsed;
  }
  const body: AppDetails = {};
  if (options.contactEmail !== undefined) body.contactEmail = options.contactEmail;
  if (options.contactPhone !== undefined) body.contactPhone = options.contactPhone;
  if (options.contactWebsite !== undefined) body.contactWebsite = options.contactWebsite;
  if (options.defaultLanguage !== undefined) {
    body.defaultLanguage = validateLocale(options.defaultLanguage, "--default-language");
  }
  if (Object.keys(body).length === 0) {
    throw invalidFlag(
      "at least one of --contact-email, --contact-phone, --contact-website, --default-language or --json is required"
    );
  }
  return body;
}

export function registerDetailsCommands(program: Command, services: Services): void {
  const details = program
    .command("details")
    .description("App details: contact information and default language");

  withEditOption(withCommonOptions(details.command("get").description("Get app details"))).action(
    action(async (options: DetailsOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<AppDetails>(editPath(packageName, editId, "details")),
        options
      );
    })
  );

  for (const name of ["update", "patch"] as const) {
    withEditOption(
      withCommonOptions(
        details
          .command(name)
          .description(name === "update" ? "Replace app details" : "Patch app details")
          .option("--contact-email <email>", "contact email address")
          .option("--contact-phone <phone>", "contact phone number")
          .option("--contact-website <url>", "contact website URL")
          .option("--default-language <code>", "default listing language, e.g. en-US")
          .option("--json <json>", "AppDetails JSON or @file (replaces the field flags)")
      )
    ).action(
      action(async (options: DetailsOptions) => {
        validateOutputOptions(options);
        const editId = requireOption(options.edit, "--edit");
        const body = detailsBody(options);
        const packageName = requirePackage(services, options.package);
        const path = editPath(packageName, editId, "details");
        const result =
          name === "update"
            ? await services.publisher.put<AppDetails>(path, body)
            : await services.publisher.patch<AppDetails>(path, body);
        printOutput(result, options);
      })
    );
  }
}
