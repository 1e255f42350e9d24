import { describe, expect, it } from "@jest/globals";

import { CORS_ALLOWED_HEADERS, createCorsOptions } from "../corsConfig";

const toLowerSet = (values: readonly string[]) =>
  new Set(values.map((value) => value.toLowerCase()));

describe("CORS configuration", () => {
  it("allows the upload filename header alongside the base headers", () => {
    const expectedHeaders = ["content-type", "authorization", "x-request-id", "x-filename"];

    expect(toLowerSet(CORS_ALLOWED_HEADERS)).toEqual(new Set(expectedHeaders));

    const options = createCorsOptions(() => true);
    const allowedHeaders = Array.isArray(options.allowedHeaders)
      ? options.allowedHeaders
      : typeof options.allowedHeaders === "string"
        ? options.allowedHeaders.split(",")
        : [];

    expect(toLowerSet(allowedHeaders)).toEqual(new Set(expectedHeaders));
  });

  it("rejects origins the predicate refuses", () => {
    const options = createCorsOptions((origin) => origin === "https://shop.example.com");
    const results: Array<{ error: Error | null; allowed?: unknown }> = [];

    const { origin } = options;
    if (typeof origin !== "function") {
      throw new Error("Expected an origin callback");
    }

    origin("https://shop.example.com", (error, allowed) => {
      results.push({ error, allowed });
    });
    origin("https://other.example.com", (error, allowed) => {
      results.push({ error, allowed });
    });

    expect(results[0]).toEqual({ error: null, allowed: true });
    expect(results[1].error?.message).toBe("Not allowed by CORS: https://other.example.com");
  });
});
