import { z } from 'zod';

/** Record count as sent by the server, a number or a numeric string. */
const countSchema = z.union([z.number(), z.string().regex(/^-?\d+$/).transform(Number)]);

/** Body of a query envelope; the count key depends on the server version. */
const queryBodySchema = z.object({
  '@count': countSchema.optional(),
  '@counts': countSchema.optional(),
  count: countSchema.optional(),
  entity: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
});

/** Normalized data-query envelope. */
export interface QueryEnvelope {
  /** Record count reported by the server, `null` when it sent none. */
  count: number | null;
  /** Entities of this response; a single entity becomes a list of one. */
  entities: unknown[];
}

/**
 * Schema of a data-query response, `{ queryResponse: { '@count', entity } }`.
 * `QueryResponse` and the `@counts`/`count` keys are accepted as well.
 */
export const queryEnvelopeSchema = z
  .union([
    z.object({ queryResponse: queryBodySchema }).transform((doc) => doc.queryResponse),
    z.object({ QueryResponse: queryBodySchema }).transform((doc) => doc.QueryResponse),
  ])
  .transform(
    (body): QueryEnvelope => ({
      count: body['@count'] ?? body['@counts'] ?? body.count ?? null,
      entities: body.entity === undefined ? [] : Array.isArray(body.entity) ? body.entity : [body.entity],
    }),
  );

/** Message of an error document, `{ errorDocument: { message } }` or a top-level `message`. */
export const errorMessageSchema = z.union([
  z.object({ errorDocument: z.object({ message: z.string() }) }).transform((doc) => doc.errorDocument.message),
  z.object({ message: z.string() }).transform((doc) => doc.message),
]);

/** HTTP methods a service resource may declare. */
export const httpMethodSchema = z
  .string()
  .transform((method) => method.toUpperCase())
  .pipe(z.enum(['GET', 'POST', 'PUT', 'DELETE', 'PATCH']));

/** Reads `key` or its `@`-prefixed form from a catalog entry. */
function attribute(entry: Record<string, unknown>, key: string): unknown {
  return entry[key] ?? entry[`@${key}`];
}

/** Entry of `data.json`: `{ displayName, url }`. */
export const dataCatalogEntrySchema = z
  .record(z.unknown())
  .transform((entry) => ({ name: attribute(entry, 'displayName'), url: attribute(entry, 'url') }))
  .pipe(z.object({ name: z.string().min(1), url: z.string().min(1) }));

/** Entry of `op.json`: `{ displayName, httpMethod, path }`. */
export const serviceCatalogEntrySchema = z
  .record(z.unknown())
  .transform((entry) => ({
    name: attribute(entry, 'displayName'),
    method: attribute(entry, 'httpMethod'),
    path: attribute(entry, 'path'),
  }))
  .pipe(z.object({ name: z.string().min(1), method: httpMethodSchema, path: z.string().min(1) }));

/**
 * Finds the entry list of a catalog document: the document itself when it is
 * an array, else the first array found breadth-first within `depth` levels.
 */
export function findEntryList(document: unknown, depth = 2): unknown[] | null {
  let level: unknown[] = [document];

  for (let current = 0; current <= depth; current++) {
    const next: unknown[] = [];
    for (const node of level) {
      if (Array.isArray(node)) {
        return node;
      }
      if (node && typeof node === 'object') {
        next.push(...Object.values(node));
      }
    }
    level = next;
  }

  return null;
}
