/**
 * Zod schemas for validating tool inputs and outputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import { AUTHOR_NAME_MAX, BOOK_TITLE_MAX } from "@bookshelf/sdk";

const IdSchema = z.string().uuid();

// Lengths count code points, as the catalog does; `.max()` would count UTF-16 units
const textOfAtMost = (max: number) =>
  z
    .string()
    .min(1)
    .refine((value) => [...value].length <= max, { message: `must be at most ${max} characters` });

const NameSchema = textOfAtMost(AUTHOR_NAME_MAX);
const TitleSchema = textOfAtMost(BOOK_TITLE_MAX);

const PageShape = {
  limit: z.number().int().min(1).max(1000).default(100),
  offset: z.number().int().min(0).default(0),
};

// Author tool inputs

export const CreateAuthorInputSchema = z.object({
  name: NameSchema,
});

export const UpdateAuthorInputSchema = z.object({
  id: IdSchema,
  name: NameSchema,
});

export const AuthorIdInputSchema = z.object({
  id: IdSchema,
});

export const ListAuthorsInputSchema = z
  .object({
    name_filter: z.string().optional(),
    ...PageShape,
  })
  .default({});

// Book tool inputs

export const CreateBookInputSchema = z.object({
  title: TitleSchema,
  author_ids: z.array(IdSchema).min(1, "author_ids must contain at least one author"),
});

export const UpdateBookInputSchema = z.object({
  id: IdSchema,
  title: TitleSchema,
  author_ids: z.array(IdSchema).min(1, "author_ids must contain at least one author"),
});

export const BookIdInputSchema = z.object({
  id: IdSchema,
});

export const ListBooksInputSchema = z
  .object({
    title_filter: z.string().optional(),
    author_id: IdSchema.optional(),
    ...PageShape,
  })
  .default({});

// Library tool inputs

export const SharedAuthorsInputSchema = z.object({
  book_a: IdSchema,
  book_b: IdSchema,
});

export const SharedBooksInputSchema = z.object({
  author_a: IdSchema,
  author_b: IdSchema,
});

export const EmptyInputSchema = z.object({}).strict().optional();

// Tool output payloads

export const AuthorOutputSchema = z.object({
  id: IdSchema,
  name: z.string(),
  book_ids: z.array(IdSchema),
});

export const BookOutputSchema = z.object({
  id: IdSchema,
  title: z.string(),
  author_ids: z.array(IdSchema).min(1),
});

export const AuthorListOutputSchema = z.object({
  authors: z.array(AuthorOutputSchema),
  total_count: z.number().int().min(0),
});

export const BookListOutputSchema = z.object({
  books: z.array(BookOutputSchema),
  total_count: z.number().int().min(0),
});
