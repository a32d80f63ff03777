import { describe, it, expect } from "vitest";
import { SpintaxSyntaxError } from "@core/errors/app-errors";
import { SpintaxExpander } from "@features/email/content/spintax.service";
import { sequenceRandom } from "./support/fakes";

describe("SpintaxExpander", () => {
  const expander = new SpintaxExpander();

  describe("expand", () => {
    it("returns text without braces unchanged", () => {
      expect(expander.expand("Hello world", () => 0.5)).toBe("Hello world");
    });

    it("chooses an option uniformly from the random draw", () => {
      expect(expander.expand("{a|b|c}", () => 0)).toBe("a");
      expect(expander.expand("{a|b|c}", () => 0.5)).toBe("b");
      expect(expander.expand("{a|b|c}", () => 0.99)).toBe("c");
    });

    it("resolves nested blocks inside the chosen option", () => {
      expect(expander.expand("{x{1|2}|y}", sequenceRandom([0, 0.9]))).toBe("x2");
      expect(expander.expand("{x{1|2}|y}", sequenceRandom([0.9]))).toBe("y");
    });

    it("keeps merge tags intact for later substitution", () => {
      expect(expander.expand("{Hi|Hello} {{first_name}}", () => 0)).toBe("Hi {{first_name}}");
      expect(expander.validate("Dear {{first_name}},")).toEqual([]);
    });

    it("treats weight suffixes as plain text when not weighted", () => {
      expect(expander.expand("{a:2|b}", () => 0)).toBe("a:2");
    });

    it("rejects malformed input with every problem listed", () => {
      expect(() => expander.expand("{a|}")).toThrow(SpintaxSyntaxError);
      expect(() => expander.expand("{a|}")).toThrow("Invalid spintax: Empty option in block at position 0");
    });

    it("uses the injected random source by default", () => {
      const seeded = new SpintaxExpander({ random: () => 0.99 });
      expect(seeded.expand("{red|green|blue}")).toBe("blue");
    });
  });

  describe("expandWeighted", () => {
    it("chooses in proportion to the weights", () => {
      expect(expander.expandWeighted("{a:1|b:1}", () => 0.4)).toBe("a");
      expect(expander.expandWeighted("{a:1|b:1}", () => 0.6)).toBe("b");
    });

    it("never picks a zero-weight option", () => {
      expect(expander.expandWeighted("{a:0|b:3}", () => 0)).toBe("b");
      expect(expander.expandWeighted("{a:0|b:3}", () => 0.99)).toBe("b");
    });

    it("falls back to uniform choice when every weight is zero", () => {
      expect(expander.expandWeighted("{a:0|b:0}", () => 0.6)).toBe("b");
    });

    it("gives options without a suffix a weight of one", () => {
      // weights 2 and 1: target 0.7 * 3 = 2.1 lands on b
      expect(expander.expandWeighted("{a:2|b}", () => 0.7)).toBe("b");
      expect(expander.expandWeighted("{a:2|b}", () => 0.5)).toBe("a");
    });
  });

  describe("countVariations", () => {
    it("multiplies sibling blocks", () => {
      expect(expander.countVariations("{a|b}{c|d|e}")).toBe(6);
    });

    it("adds the variations of nested options", () => {
      expect(expander.countVariations("{a|{b|c}}")).toBe(3);
      expect(expander.countVariations("{x{1|2}|y}")).toBe(3);
    });

    it("is one for plain text and merge tags", () => {
      expect(expander.countVariations("plain")).toBe(1);
      expect(expander.countVariations("{{first_name}} {a|b}")).toBe(2);
    });
  });

  describe("validate", () => {
    it("reports empty options", () => {
      expect(expander.validate("{a|}")).toEqual(["Empty option in block at position 0"]);
      expect(expander.validate("x{}")).toEqual(["Empty option in block at position 1"]);
    });

    it("reports unbalanced braces", () => {
      expect(expander.validate("{a|b")).toEqual(["Unclosed '{' at position 0"]);
      expect(expander.validate("a}b")).toEqual(["Unexpected '}' at position 1"]);
    });

    it("reports nesting beyond the maximum depth once", () => {
      const tooDeep = "{".repeat(11) + "a" + "}".repeat(11);
      const deepest = "{".repeat(10) + "a" + "}".repeat(10);

      expect(expander.validate(tooDeep)).toEqual(["Nesting deeper than 10 levels at position 10"]);
      expect(expander.validate(deepest)).toEqual([]);
      expect(expander.expand(deepest)).toBe("a");
    });

    it("honours a custom depth limit", () => {
      const shallow = new SpintaxExpander({ maxDepth: 1 });
      expect(shallow.validate("{a|{b|c}}")).toEqual(["Nesting deeper than 1 levels at position 3"]);
    });
  });
});
