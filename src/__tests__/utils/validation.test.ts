import { describe, expect, it } from "vitest";
import { z } from "zod";

import { validateInput } from "@/middleware/validateRequest";
import { ValidationError } from "@/utils/errors";

describe("validateInput", () => {
  const schema = z.object({
    email: z.string().email(),
    name: z.string().min(2),
  });

  it("returns the parsed value", () => {
    expect(validateInput(schema, { email: "user@example.com", name: "Alice" }, "body")).toEqual({
      email: "user@example.com",
      name: "Alice",
    });
  });

  it("throws a ValidationError listing every issue", () => {
    let caught: unknown;
    try {
      validateInput(schema, { email: "broken", name: "A" }, "body");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      statusCode: 400,
      message: "Invalid request body: email: Invalid email; name: String must contain at least 2 character(s)",
      details: {
        issues: [
          { path: "email", message: "Invalid email" },
          { path: "name", message: "String must contain at least 2 character(s)" },
        ],
      },
    });
  });
});
