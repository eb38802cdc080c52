/**
 * Catalog plans: ordered JSON steps run against one catalog
 *
 * A step may name its result with `as`; later steps refer to that entity's id
 * as "@name" in any id field.
 */

import { z } from "zod";
import type { Catalog, Identifier } from "@bookshelf/sdk";
import { CliError, StepFailedError } from "./errors.js";

const Label = z
  .string()
  .regex(/^[A-Za-z][\w-]*$/, "labels start with a letter and use letters, digits, _ or -");

const Ref = z.string();

const named = { as: Label.optional() };

const page = {
  limit: z.number().int().optional(),
  offset: z.number().int().optional(),
};

export const StepSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("author.create"), name: z.string(), ...named }).strict(),
  z.object({ op: z.literal("author.get"), id: Ref, ...named }).strict(),
  z.object({ op: z.literal("author.update"), id: Ref, name: z.string(), ...named }).strict(),
  z.object({ op: z.literal("author.delete"), id: Ref }).strict(),
  z.object({ op: z.literal("author.list"), name_filter: z.string().optional(), ...page }).strict(),
  z.object({ op: z.literal("book.create"), title: z.string(), author_ids: z.array(Ref), ...named }).strict(),
  z.object({ op: z.literal("book.get"), id: Ref, ...named }).strict(),
  z
    .object({ op: z.literal("book.update"), id: Ref, title: z.string(), author_ids: z.array(Ref), ...named })
    .strict(),
  z.object({ op: z.literal("book.delete"), id: Ref }).strict(),
  z
    .object({
      op: z.literal("book.list"),
      title_filter: z.string().optional(),
      author_id: Ref.optional(),
      ...page,
    })
    .strict(),
  z.object({ op: z.literal("library.shared_authors"), book_a: Ref, book_b: Ref }).strict(),
  z.object({ op: z.literal("library.shared_books"), author_a: Ref, author_b: Ref }).strict(),
  z.object({ op: z.literal("library.authors_without_books") }).strict(),
  z.object({ op: z.literal("catalog.stats") }).strict(),
]);

export const PlanSchema = z.array(StepSchema);

export type Step = z.infer<typeof StepSchema>;
export type StepOp = Step["op"];

export interface StepResult {
  /** 1-based position in the plan */
  step: number;
  op: StepOp;
  result: unknown;
}

export interface PlanOutcome {
  results: StepResult[];
  /** First failing step; later steps were not run */
  failure?: StepFailedError;
}

/**
 * Validate a parsed JSON document as a plan
 * @throws {CliError} listing every malformed step field
 */
export function parsePlan(input: unknown): Step[] {
  const parsed = PlanSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "plan"}: ${issue.message}`)
      .join("; ");
    throw new CliError(`Invalid plan: ${details}`);
  }
  return parsed.data;
}

/**
 * Labels bound so far in one run
 */
export class LabelScope {
  #ids = new Map<string, Identifier>();

  bind(label: string, id: Identifier): void {
    if (this.#ids.has(label)) {
      throw new CliError(`Label "${label}" is already bound`);
    }
    this.#ids.set(label, id);
  }

  /**
   * Replace an "@label" reference with the bound id; other values pass through
   */
  resolve(value: string): Identifier {
    if (!value.startsWith("@")) {
      return value;
    }
    const id = this.#ids.get(value.slice(1));
    if (id === undefined) {
      throw new CliError(`Unknown reference "${value}"`);
    }
    return id;
  }

  resolveAll(values: string[]): Identifier[] {
    return values.map((value) => this.resolve(value));
  }
}

async function execute(catalog: Catalog, step: Step, scope: LabelScope): Promise<unknown> {
  const { authors, books, library } = catalog;

  switch (step.op) {
    case "author.create":
      return authors.create(step.name);
    case "author.get":
      return authors.get(scope.resolve(step.id));
    case "author.update":
      return authors.update(scope.resolve(step.id), step.name);
    case "author.delete":
      await authors.delete(scope.resolve(step.id));
      return { ok: true };
    case "author.list":
      return authors.list({ name_filter: step.name_filter, limit: step.limit, offset: step.offset });
    case "book.create":
      return books.create(step.title, scope.resolveAll(step.author_ids));
    case "book.get":
      return books.get(scope.resolve(step.id));
    case "book.update":
      return books.update(scope.resolve(step.id), step.title, scope.resolveAll(step.author_ids));
    case "book.delete":
      await books.delete(scope.resolve(step.id));
      return { ok: true };
    case "book.list":
      return books.list({
        title_filter: step.title_filter,
        author_id: step.author_id === undefined ? undefined : scope.resolve(step.author_id),
        limit: step.limit,
        offset: step.offset,
      });
    case "library.shared_authors":
      return { author_ids: await library.sharedAuthors(scope.resolve(step.book_a), scope.resolve(step.book_b)) };
    case "library.shared_books":
      return { book_ids: await library.sharedBooks(scope.resolve(step.author_a), scope.resolve(step.author_b)) };
    case "library.authors_without_books":
      return { authors: await library.authorsWithoutBooks() };
    case "catalog.stats":
      return catalog.stats();
  }
}

function labelOf(step: Step): string | undefined {
  return "as" in step ? step.as : undefined;
}

function idOf(result: unknown): Identifier | undefined {
  if (typeof result === "object" && result !== null && "id" in result && typeof result.id === "string") {
    return result.id;
  }
  return undefined;
}

/**
 * Run steps in order, stopping at the first failure
 */
export async function runPlan(catalog: Catalog, steps: Step[]): Promise<PlanOutcome> {
  const scope = new LabelScope();
  const results: StepResult[] = [];

  for (const [index, step] of steps.entries()) {
    const position = index + 1;
    try {
      const result = await execute(catalog, step, scope);

      const label = labelOf(step);
      if (label !== undefined) {
        const id = idOf(result);
        if (id === undefined) {
          throw new CliError(`Step result has no id to bind to "${label}"`);
        }
        scope.bind(label, id);
      }

      results.push({ step: position, op: step.op, result });
    } catch (err) {
      return { results, failure: new StepFailedError(position, step.op, err) };
    }
  }

  return { results };
}
