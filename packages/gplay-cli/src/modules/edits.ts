import { Command } from "commander";
import type { Services } from "../lib/services.js";
import {
  action,
  printOutput,
  requireConfirm,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  withEditOption,
  type CommonOptions,
  type EditOptions,
} from "../lib/command.js";
import { appPath, commitQuery, editPath, type AppEdit } from "../lib/edits.js";

type EditCommandOptions = CommonOptions &
  EditOptions & { changesNotSentForReview?: boolean; confirm?: boolean };

export function registerEditsCommands(program: Command, services: Services): void {
  const edits = program
    .command("edits")
    .description("Manage app edits (transactions grouping listing and release changes)");

  withCommonOptions(edits.command("create").description("Create a new edit")).action(
    action(async (options: EditCommandOptions) => {
      validateOutputOptions(options);
      const packageName = requirePackage(services, options.package);
      const edit = await services.publisher.post<AppEdit>(appPath(packageName, "edits"), {});
      printOutput(edit, options);
    })
  );

  withEditOption(withCommonOptions(edits.command("get").description("Get an edit"))).action(
    action(async (options: EditCommandOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const packageName = requirePackage(services, options.package);
      printOutput(await services.publisher.get<AppEdit>(editPath(packageName, editId)), options);
    })
  );

  withEditOption(
    withCommonOptions(edits.command("validate").description("Validate an edit without committing"))
  ).action(
    action(async (options: EditCommandOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const packageName = requirePackage(services, options.package);
      const edit = await services.publisher.post<AppEdit>(`${editPath(packageName, editId)}:validate`);
      printOutput(edit, options);
    })
  );

  withEditOption(
    withCommonOptions(
      edits
        .command("commit")
        .description("Commit an edit")
        .option("--changes-not-sent-for-review", "commit without sending changes for review")
    )
  ).action(
    action(async (options: EditCommandOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      const packageName = requirePackage(services, options.package);
      const edit = await services.publisher.post<AppEdit>(
        `${editPath(packageName, editId)}:commit`,
        undefined,
        { query: commitQuery(options.changesNotSentForReview) }
      );
      printOutput(edit, options);
    })
  );

  withEditOption(
    withCommonOptions(
      edits
        .command("delete")
        .description("Delete an edit and discard its changes")
        .option("--confirm", "confirm deletion")
    )
  ).action(
    action(async (options: EditCommandOptions) => {
      validateOutputOptions(options);
      const editId = requireOption(options.edit, "--edit");
      requireConfirm(options.confirm, "delete an edit");
      const packageName = requirePackage(services, options.package);
      await services.publisher.delete<unknown>(editPath(packageName, editId));
      printOutput({ editId, packageName, deleted: true }, options);
    })
  );
}
