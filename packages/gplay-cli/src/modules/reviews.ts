import { Command } from "commander";
import type { androidpublisher_v3 } from "googleapis";
import type { Services } from "../lib/services.js";
import {
  action,
  parseIntFlag,
  printOutput,
  requireOption,
  requirePackage,
  validateOutputOptions,
  withCommonOptions,
  type CommonOptions,
} from "../lib/command.js";
import { appPath } from "../lib/edits.js";
import { invalidFlag } from "../lib/errors/catalog.js";
import { collectPages, nextPageToken } from "../lib/pagination.js";

type Review = androidpublisher_v3.Schema$Review;
type ReviewsListResponse = androidpublisher_v3.Schema$ReviewsListResponse;
type ReviewsReplyResponse = androidpublisher_v3.Schema$ReviewsReplyResponse;

export const MAX_REPLY_LENGTH = 350;

type ReviewOptions = CommonOptions & {
  startIndex?: string;
  maxResults: string;
  translationLanguage?: string;
  paginate?: boolean;
  review?: string;
  text?: string;
};

export interface ListReviewsRequest {
  packageName: string;
  maxResults: number;
  startIndex?: number;
  translationLanguage?: string;
}

/** Fetch every page of reviews, following `tokenPagination.nextPageToken`. */
export function listAllReviews(
  services: Pick<Services, "publisher">,
  { packageName, maxResults, startIndex, translationLanguage }: ListReviewsRequest
): Promise<Review[]> {
  return collectPages(
    (token) =>
      services.publisher.get<ReviewsListResponse>(appPath(packageName, "reviews"), {
        query: { maxResults, startIndex, translationLanguage, token },
      }),
    { items: (page) => page.reviews, nextToken: nextPageToken }
  );
}

export function validateReplyText(value: string | undefined): string {
  const text = requireOption(value, "--text");
  const length = Array.from(text).length;
  if (length > MAX_REPLY_LENGTH) {
    throw invalidFlag(`--text must be at most ${MAX_REPLY_LENGTH} characters, got ${length}`);
  }
  return text;
}

export function registerReviewsCommands(program: Command, services: Services): void {
  const reviews = program.command("reviews").description("Read and reply to user reviews");

  withCommonOptions(
    reviews
      .command("list")
      .description("List recent reviews")
      .option("--start-index <n>", "index of the first review")
      .option("--max-results <n>", "reviews per page", "50")
      .option("--translation-language <code>", "translate reviews into this language")
      .option("--paginate", "fetch every page")
  ).action(
    action(async (options: ReviewOptions) => {
      validateOutputOptions(options);
      const maxResults = parseIntFlag(options.maxResults, "--max-results");
      const startIndex =
        options.startIndex !== undefined ? parseIntFlag(options.startIndex, "--start-index") : undefined;
      const translationLanguage = options.translationLanguage?.trim() || undefined;
      const packageName = requirePackage(services, options.package);

      if (options.paginate) {
        const all = await listAllReviews(services, {
          packageName,
          maxResults,
          startIndex,
          translationLanguage,
        });
        printOutput(all, options);
        return;
      }
      const page = await services.publisher.get<ReviewsListResponse>(appPath(packageName, "reviews"), {
        query: { maxResults, startIndex, translationLanguage },
      });
      printOutput(page, options);
    })
  );

  withCommonOptions(
    reviews
      .command("get")
      .description("Get one review")
      .option("--review <id>", "review ID")
      .option("--translation-language <code>", "translate the review into this language")
  ).action(
    action(async (options: ReviewOptions) => {
      validateOutputOptions(options);
      const reviewId = requireOption(options.review, "--review");
      const packageName = requirePackage(services, options.package);
      const review = await services.publisher.get<Review>(appPath(packageName, "reviews", reviewId), {
        query: { translationLanguage: options.translationLanguage?.trim() || undefined },
      });
      printOutput(review, options);
    })
  );

  withCommonOptions(
    reviews
      .command("reply")
      .description(`Reply to a review (${MAX_REPLY_LENGTH} characters max)`)
      .option("--review <id>", "review ID")
      .option("--text <text>", "reply text")
  ).action(
    action(async (options: ReviewOptions) => {
      validateOutputOptions(options);
      const reviewId = requireOption(options.review, "--review");
      const replyText = validateReplyText(options.text);
      const packageName = requirePackage(services, options.package);
      const response = await services.publisher.post<ReviewsReplyResponse>(
        `${appPath(packageName, "reviews", reviewId)}:reply`,
        { replyText }
      );
      printOutput(response, options);
    })
  );
}
