import type { z } from "zod";
import { UnexpectedResponseError } from "../core/exceptions.js";

/** Read a response body as JSON and validate it against `schema`. */
export async function parseResponse<S extends z.ZodTypeAny>(
  response: Response,
  schema: S,
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new UnexpectedResponseError(
      `Response from ${response.url || "server"} is not JSON`,
      { cause: err },
    );
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new UnexpectedResponseError(
      `Unexpected response from ${response.url || "server"}: ${parsed.error.message}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
