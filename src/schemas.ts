/**
 * Runtime validation for data crossing a boundary: adapter output, stored JSON, env.
 */

import { z } from "zod";
import type { BookSource, ChapterSource, FetchedChapter } from "./types.js";

const httpUrl = z
  .string()
  .url()
  .refine((value) => value.startsWith("http://") || value.startsWith("https://"), {
    message: "must use http or https",
  });

export const bookSourceSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("royalroad"), fictionId: z.number().int().positive() }),
  z.object({
    type: z.literal("feed"),
    feedUrl: httpUrl,
    contentSelector: z.string().min(1).optional(),
  }),
]) satisfies z.ZodType<BookSource>;

export const chapterSourceSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("royalroad"),
    fictionId: z.number().int().positive(),
    chapterId: z.number().int().positive(),
    url: httpUrl,
  }),
  z.object({ type: z.literal("feed"), url: httpUrl }),
]) satisfies z.ZodType<ChapterSource>;

/** One record of adapter output; records failing this are skipped individually */
export const fetchedChapterSchema = z.object({
  key: z.string().trim().min(1),
  title: z.string().trim().min(1),
  content: z.string().optional(),
  publishedAt: z.date().nullable(),
  source: chapterSourceSchema,
}) satisfies z.ZodType<FetchedChapter>;

/**
 * Flatten a zod error into one line, e.g. "title: Required; source.url: Invalid url".
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
