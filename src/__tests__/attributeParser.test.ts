import { describe, expect, it } from "vitest";
import {
  DEFAULT_SCHEMA,
  extractAttributes,
  normalizeValue,
  resolveSchema,
} from "../services/attributeParser";

describe("attributeParser", () => {
  describe("extractAttributes", () => {
    it("should read trait_type/value pairs in order", () => {
      const result = extractAttributes(
        {
          name: "Item #1",
          attributes: [
            { trait_type: "bg", value: "red" },
            { trait_type: "eyes", value: "laser" },
          ],
        },
        DEFAULT_SCHEMA
      );

      expect(result).toEqual({
        ok: true,
        attributes: [
          { trait: "bg", value: "red" },
          { trait: "eyes", value: "laser" },
        ],
      });
    });

    it("should fall back to a plain trait field", () => {
      const result = extractAttributes({ attributes: [{ trait: "bg", value: "blue" }] }, DEFAULT_SCHEMA);
      expect(result).toEqual({ ok: true, attributes: [{ trait: "bg", value: "blue" }] });
    });

    it("should trim trait names and stringify non-string values", () => {
      const result = extractAttributes(
        {
          attributes: [
            { trait_type: "  level ", value: 7 },
            { trait_type: "shiny", value: true },
            { trait_type: "hat", value: null },
            { trait_type: "meta", value: { a: 1 } },
          ],
        },
        DEFAULT_SCHEMA
      );

      expect(result).toEqual({
        ok: true,
        attributes: [
          { trait: "level", value: "7" },
          { trait: "shiny", value: "true" },
          { trait: "hat", value: "None" },
          { trait: "meta", value: '{"a":1}' },
        ],
      });
    });

    it("should freeze parsed entries", () => {
      const result = extractAttributes({ attributes: [{ trait_type: "bg", value: "red" }] }, DEFAULT_SCHEMA);
      expect(result.ok && Object.isFrozen(result.attributes[0])).toBe(true);
    });

    it("should accept an empty attribute list", () => {
      expect(extractAttributes({ attributes: [] }, DEFAULT_SCHEMA)).toEqual({ ok: true, attributes: [] });
    });

    it("should reject documents without the attributes field", () => {
      expect(extractAttributes({ name: "x" }, DEFAULT_SCHEMA)).toEqual({
        ok: false,
        detail: "attributes not found",
      });
    });

    it("should reject non-array attributes", () => {
      expect(extractAttributes({ attributes: { bg: "red" } }, DEFAULT_SCHEMA)).toEqual({
        ok: false,
        detail: "attributes is not an array",
      });
    });

    it("should reject non-object documents and entries", () => {
      expect(extractAttributes([1, 2], DEFAULT_SCHEMA)).toEqual({
        ok: false,
        detail: "metadata is not a JSON object",
      });
      expect(extractAttributes({ attributes: ["bg"] }, DEFAULT_SCHEMA)).toEqual({
        ok: false,
        detail: "attributes[0] is not an object",
      });
    });

    it("should skip a blank trait_type and use the trait fallback", () => {
      const result = extractAttributes({ attributes: [{ trait_type: "  ", trait: "bg", value: "red" }] }, DEFAULT_SCHEMA);
      expect(result).toEqual({ ok: true, attributes: [{ trait: "bg", value: "red" }] });
    });

    it("should reject entries without a trait name", () => {
      expect(extractAttributes({ attributes: [{ value: "red" }] }, DEFAULT_SCHEMA)).toEqual({
        ok: false,
        detail: "attributes[0] has no trait name",
      });
    });

    it("should honour a custom field mapping", () => {
      const schema = resolveSchema({ attributesField: "traits", traitFields: ["type"], valueField: "val" });
      const result = extractAttributes({ traits: [{ type: "bg", val: "green" }] }, schema);
      expect(result).toEqual({ ok: true, attributes: [{ trait: "bg", value: "green" }] });
    });
  });

  describe("resolveSchema", () => {
    it("should fill unset fields from the defaults", () => {
      expect(resolveSchema({ valueField: "v", traitFields: [] })).toEqual({
        attributesField: "attributes",
        traitFields: ["trait_type", "trait"],
        valueField: "v",
      });
    });
  });

  describe("normalizeValue", () => {
    it("should map empty values to None", () => {
      expect(normalizeValue("")).toBe("None");
      expect(normalizeValue(undefined)).toBe("None");
      expect(normalizeValue(0)).toBe("0");
    });
  });
});
