type Row = Record<string, unknown>;
type FetchInput = Parameters<typeof fetch>[0];
type FetchInit = Parameters<typeof fetch>[1];
type Tables = Map<string, Row[]>;

/** A database function reachable at /rest/v1/rpc/<name>. Throwing rolls it back. */
export type RpcHandler = (args: Row, tables: Tables) => void;

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });

const isRow = (value: unknown): value is Row => typeof value === "object" && value !== null && !Array.isArray(value);

const compareValues = (a: unknown, b: unknown): number => {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
};

const compare = (value: unknown, operator: string, operand: string): boolean => {
  const target = typeof value === "number" ? Number(operand) : operand;
  switch (operator) {
    case "eq":
      return String(value) === operand;
    case "neq":
      return String(value) !== operand;
    case "gte":
      return compareValues(value, target) >= 0;
    case "lte":
      return compareValues(value, target) <= 0;
    default:
      throw new Error(`Unsupported filter operator: ${operator}`);
  }
};

const RESERVED_PARAMS = new Set(["select", "order", "limit", "offset", "columns"]);

/** Same effect as replace_face_embeddings in supabase/schema.sql. */
export const replaceFaceEmbeddings: RpcHandler = (args, tables) => {
  const entries: unknown = args.entries;
  if (!Array.isArray(entries)) {
    throw new Error("entries must be an array");
  }
  const list: unknown[] = entries;
  const rows = list.map((entry, index) => {
    if (!isRow(entry)) {
      throw new Error(`entry ${index} is not an object`);
    }
    return { id: index + 1, label: entry.label, position: entry.position, vector: entry.vector };
  });
  tables.set("face_embeddings", rows);
};

/**
 * In-process stand-in for the PostgREST endpoint behind a Supabase project.
 * Pass `fetch` to createClient via `global.fetch`; rows live in `tables`.
 * Supports the eq/neq/gte/lte filters, multi-column order, select, insert,
 * delete and the database functions in `functions`.
 */
export const createPostgrestFetch = (
  functions: Record<string, RpcHandler> = { replace_face_embeddings: replaceFaceEmbeddings },
) => {
  const tables: Tables = new Map();
  const failures = new Map<string, string>();
  let nextId = 1;

  const rowsOf = (table: string) => {
    const rows = tables.get(table) ?? [];
    tables.set(table, rows);
    return rows;
  };

  const matches = (row: Row, params: URLSearchParams) => {
    for (const [column, filter] of params) {
      if (RESERVED_PARAMS.has(column)) continue;
      const dot = filter.indexOf(".");
      if (!compare(row[column], filter.slice(0, dot), filter.slice(dot + 1))) return false;
    }
    return true;
  };

  const readBody = (init?: FetchInit): unknown => JSON.parse(typeof init?.body === "string" ? init.body : "null");

  const callFunction = (name: string, init?: FetchInit): Response => {
    const handler = functions[name];
    if (!handler) {
      return json({ message: `Could not find the function public.${name}`, code: "PGRST202" }, 404);
    }
    const args = readBody(init);
    // Run against a copy so a failing function leaves every table as it was
    const draft: Tables = new Map([...tables].map(([table, rows]) => [table, rows.map((row) => ({ ...row }))]));
    try {
      handler(isRow(args) ? args : {}, draft);
    } catch (error) {
      return json({ message: error instanceof Error ? error.message : String(error), code: "P0001" }, 400);
    }
    tables.clear();
    draft.forEach((rows, table) => tables.set(table, rows));
    return new Response(null, { status: 204 });
  };

  const fetchImpl = async (input: FetchInput, init?: FetchInit): Promise<Response> => {
    const href = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const target = url.pathname.replace(/^\/rest\/v1\//, "");
    const method = (init?.method ?? "GET").toUpperCase();

    const failure = failures.get(target);
    if (failure) {
      failures.delete(target);
      return json({ message: failure, code: "XX000", details: null, hint: null }, 500);
    }

    if (target.startsWith("rpc/")) {
      return callFunction(target.slice("rpc/".length), init);
    }

    const rows = rowsOf(target);

    if (method === "GET") {
      let selected = rows.filter((row) => matches(row, url.searchParams));

      const order = url.searchParams.get("order");
      if (order) {
        const keys = order.split(",").map((part) => {
          const [column, direction] = part.split(".");
          return { column, sign: direction === "desc" ? -1 : 1 };
        });
        selected = [...selected].sort((a, b) => {
          for (const { column, sign } of keys) {
            const result = compareValues(a[column], b[column]) * sign;
            if (result !== 0) return result;
          }
          return 0;
        });
      }

      const columns = url.searchParams.get("select");
      if (columns && columns !== "*") {
        const names = columns.split(",");
        selected = selected.map((row) => Object.fromEntries(names.map((name) => [name, row[name]])));
      }
      return json(selected);
    }

    if (method === "POST") {
      const body = readBody(init);
      const inserted: unknown[] = Array.isArray(body) ? body : [body];
      for (const row of inserted) {
        if (!isRow(row)) {
          return json({ message: "Expected a JSON object per row" }, 400);
        }
        rows.push({ id: nextId++, ...row });
      }
      return new Response(null, { status: 201 });
    }

    if (method === "DELETE") {
      tables.set(
        target,
        rows.filter((row) => !matches(row, url.searchParams)),
      );
      return new Response(null, { status: 204 });
    }

    return json({ message: `Unsupported method ${method}` }, 405);
  };

  return {
    fetch: fetchImpl,
    tables,
    /** Make the next request against `target` (a table or `rpc/<name>`) fail with `message`. */
    failNext(target: string, message: string) {
      failures.set(target, message);
    },
  };
};
