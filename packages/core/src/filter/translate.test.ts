import { describe, expect, it } from "vitest";
import { UnsupportedFilterError } from "../authz/errors.js";
import { arg, eq } from "./expr.js";
import { identityTranslator, translatorSupports, type FilterTranslator } from "./translate.js";

describe("filter translators", () => {
  it("passes resolved filters through the identity translator", () => {
    expect(identityTranslator.translate(eq("id", "p1"))).toEqual(eq("id", "p1"));
    expect(() => identityTranslator.translate(eq("slug", arg("slug")))).toThrow(UnsupportedFilterError);
    expect(translatorSupports(identityTranslator, eq("slug", arg("slug")))).toBe(false);
  });

  it("prefers a declared supports hook and rethrows other errors", () => {
    const declared: FilterTranslator<string> = {
      name: "declared",
      translate: () => "sql",
      supports: (expr) => expr.op === "const",
    };
    expect(translatorSupports(declared, eq("id", 1))).toBe(false);

    const broken: FilterTranslator<string> = {
      name: "broken",
      translate: () => {
        throw new Error("boom");
      },
    };
    expect(() => translatorSupports(broken, eq("id", 1))).toThrow("boom");
  });
});
