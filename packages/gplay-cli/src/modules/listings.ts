import { Command } from "commander";
import type { androidpublisher_v3 } from "googleapis";
import type { Services } from "../lib/services.js";
import {
  action,
  printOutput,
  requireChoice,
  requireConfirm,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  withEditOption,
  type CommonOptions,
  type EditOptions,
} from "../lib/command.js";
import {
  editPath,
  withEdit,
  type Listing,
  type ListingsListResponse,
} from "../lib/edits.js";
import { invalidFlag } from "../lib/errors/catalog.js";
import { assertFile } from "../lib/files.js";
import { readJsonArg } from "../lib/json-arg.js";
import { validateLocale, validateVideoUrl } from "../lib/locales.js";
import { IMAGE_TYPES } from "../lib/metadata.js";

type ImagesListResponse = androidpublisher_v3.Schema$ImagesListResponse;
type ImagesUploadResponse = androidpublisher_v3.Schema$ImagesUploadResponse;
type ImagesDeleteAllResponse = androidpublisher_v3.Schema$ImagesDeleteAllResponse;

type ListingOptions = CommonOptions &
  EditOptions & {
    locale?: string;
    title?: string;
    shortDescription?: string;
    fullDescription?: string;
    video?: string;
    json?: string;
    confirm?: boolean;
  };

type ImageOptions = CommonOptions &
  EditOptions & {
    locale?: string;
    type?: string;
    file?: string;
    image?: string;
    confirm?: boolean;
  };

/**
 * Request body for listings update/patch. --json replaces the field flags;
 * either way at least one field is required.
 */
export function listingBody(locale: string, options: ListingOptions): Listing {
  if (options.json !== undefined) {
    const parsed = readJsonArg(options.json);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw invalidFlag("--json must be a Listing JSON object");
    }
    return { ...parsed, language: locale };
  }

  const body: Listing = { language: locale };
  if (options.title !== undefined) body.title = options.title;
  if (options.shortDescription !== undefined) body.shortDescription = options.shortDescription;
  if (options.fullDescription !== undefined) body.fullDescription = options.fullDescription;
  if (options.video !== undefined) {
    validateVideoUrl(options.video);
    body.video = options.video;
  }
  if (Object.keys(body).length === 1) {
    throw invalidFlag(
      "at least one of --title, --short-description, --full-description, --video or --json is required"
    );
  }
  return body;
}

function listingCommand(parent: Command, name: string, description: string): Command {
  return withEditOption(withCommonOptions(parent.command(name).description(description)));
}

export function registerListingsCommands(program: Command, services: Services): void {
  const listings = program.command("listings").description("Manage localized store listings");

  listingCommand(listings, "list", "List all store listings in an edit").action(
    action(async (options: ListingOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<ListingsListResponse>(editPath(packageName, editId, "listings")),
        options
      );
    })
  );

  listingCommand(listings, "get", "Get the listing for one locale")
    .option("--locale <code>", "locale, e.g. en-US")
    .action(
      action(async (options: ListingOptions) => {
        validateOutputOptions(options);
        const locale = validateLocale(requireOption(options.locale, "--locale"));
        const editId = requireOption(options.edit, "--edit");
        const packageName = requirePackage(services, options.package);
        printOutput(
          await services.publisher.get<Listing>(editPath(packageName, editId, "listings", locale)),
          options
        );
      })
    );

  for (const name of ["update", "patch"] as const) {
    listingCommand(
      listings,
      name,
      name === "update" ? "Create or replace the listing for a locale" : "Patch the listing for a locale"
    )
      .option("--locale <code>", "locale, e.g. en-US")
      .option("--title <text>", "app title (30 characters max)")
      .option("--short-description <text>", "short description (80 characters max)")
      .option("--full-description <text>", "full description (4000 characters max)")
      .option("--video <url>", "YouTube promo video URL")
      .option("--json <json>", "Listing JSON or @file (replaces the field flags)")
      .action(
        action(async (options: ListingOptions) => {
          validateOutputOptions(options);
          const locale = validateLocale(requireOption(options.locale, "--locale"));
          const editId = requireOption(options.edit, "--edit");
          const body = listingBody(locale, options);
          const packageName = requirePackage(services, options.package);
          const path = editPath(packageName, editId, "listings", locale);
          const result =
            name === "update"
              ? await services.publisher.put<Listing>(path, body)
              : await services.publisher.patch<Listing>(path, body);
          printOutput(result, options);
        })
      );
  }

  listingCommand(listings, "delete", "Delete the listing for one locale")
    .option("--locale <code>", "locale, e.g. en-US")
    .option("--confirm", "confirm deletion")
    .action(
      action(async (options: ListingOptions) => {
        validateOutputOptions(options);
        const locale = requireOption(options.locale, "--locale");
        requireConfirm(options.confirm, "delete a listing");
        const editId = requireOption(options.edit, "--edit");
        const packageName = requirePackage(services, options.package);
        await services.publisher.delete<unknown>(editPath(packageName, editId, "listings", locale));
        printOutput({ locale, deleted: true }, options);
      })
    );

  listingCommand(listings, "delete-all", "Delete every store listing in an edit")
    .option("--confirm", "confirm deletion")
    .action(
      action(async (options: ListingOptions) => {
        validateOutputOptions(options);
        requireConfirm(options.confirm, "delete all listings");
        const editId = requireOption(options.edit, "--edit");
        const packageName = requirePackage(services, options.package);
        await services.publisher.delete<unknown>(editPath(packageName, editId, "listings"));
        printOutput({ deleted: true }, options);
      })
    );

  withEditOption(
    withCommonOptions(listings.command("locales").description("List the locales with a store listing")),
    false
  ).action(
    action(async (options: ListingOptions) => {
      validateOutputOptions(options);
      const packageName = requirePackage(services, options.package);
      const response = await withEdit(services.publisher, packageName, options.edit, (editId) =>
        services.publisher.get<ListingsListResponse>(editPath(packageName, editId, "listings"))
      );
      const locales = (response.listings ?? []).flatMap((listing) =>
        listing.language ? [listing.language] : []
      );
      printOutput({ locales, total: locales.length }, options);
    })
  );
}

export function registerImagesCommands(program: Command, services: Services): void {
  const images = program
    .command("images")
    .description("Manage store listing graphics")
    .addHelpText("after", `\nImage types: ${IMAGE_TYPES.join(", ")}\n`);

  const target = (options: ImageOptions) => {
    const locale = validateLocale(requireOption(options.locale, "--locale"));
    const type = requireChoice(options.type, "--type", IMAGE_TYPES);
    const editId = requireOption(options.edit, "--edit");
    return { locale, type, editId };
  };

  const imageCommand = (name: string, description: string) =>
    listingCommand(images, name, description)
      .option("--locale <code>", "locale, e.g. en-US")
      .option("--type <type>", "image type, e.g. phoneScreenshots");

  imageCommand("list", "List images of one type").action(
    action(async (options: ImageOptions) => {
      validateOutputOptions(options);
      const { locale, type, editId } = target(options);
      const packageName = requirePackage(services, options.package);
      printOutput(
        await services.publisher.get<ImagesListResponse>(
          editPath(packageName, editId, "listings", locale, type)
        ),
        options
      );
    })
  );

  imageCommand("upload", "Upload an image")
    .option("--file <path>", "PNG, JPEG or WebP file")
    .action(
      action(async (options: ImageOptions) => {
        validateOutputOptions(options);
        const { locale, type, editId } = target(options);
        const file = requireOption(options.file, "--file");
        assertFile(file);
        const packageName = requirePackage(services, options.package);
        printOutput(
          await services.publisher.upload<ImagesUploadResponse>(
            editPath(packageName, editId, "listings", locale, type),
            file
          ),
          options
        );
      })
    );

  imageCommand("delete", "Delete one image")
    .option("--image <id>", "image ID from images list")
    .option("--confirm", "confirm deletion")
    .action(
      action(async (options: ImageOptions) => {
        validateOutputOptions(options);
        const { locale, type, editId } = target(options);
        const imageId = requireOption(options.image, "--image");
        requireConfirm(options.confirm, "delete an image");
        const packageName = requirePackage(services, options.package);
        await services.publisher.delete<unknown>(
          editPath(packageName, editId, "listings", locale, type, imageId)
        );
        printOutput({ locale, type, imageId, deleted: true }, options);
      })
    );

  imageCommand("delete-all", "Delete every image of one type")
    .option("--confirm", "confirm deletion")
    .action(
      action(async (options: ImageOptions) => {
        validateOutputOptions(options);
        const { locale, type, editId } = target(options);
        requireConfirm(options.confirm, "delete all images");
        const packageName = requirePackage(services, options.package);
        printOutput(
          await services.publisher.delete<ImagesDeleteAllResponse>(
            editPath(packageName, editId, "listings", locale, type)
          ),
          options
        );
      })
    );
}
