import { describe, expect, it } from "vitest";

import { corsOptions } from "../createApp";

describe("corsOptions", () => {
  it("allows the configured origins for the API methods", () => {
    expect(corsOptions(["https://portfolio.test"])).toEqual({
      origin: ["https://portfolio.test"],
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    });
  });
});
