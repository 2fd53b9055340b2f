import { describe, expect, it } from "vitest";
import { TemplateType, formatUsingNumberTemplate, formatUsingStringTemplate, parseFormatString } from "./Print.ts";
import type { NumberTemplate } from "./Print.ts";

function numberTemplate(format: string): NumberTemplate {
  const [template] = parseFormatString(format);
  if (template.type !== TemplateType.NUMBER) {
    throw new Error(`not a number field: ${format}`);
  }
  return template;
}

function formatNumber(format: string, number: number): string {
  return formatUsingNumberTemplate(number, numberTemplate(format));
}

describe("parseFormatString", () => {
  it("separates literals from fields", () => {
    expect(parseFormatString("A=## B")).toEqual([
      {type: TemplateType.LITERAL, text: 'A='},
      {type: TemplateType.NUMBER, beforeDecimal: 2},
      {type: TemplateType.LITERAL, text: ' B'},
    ]);
  });

  it("reads the parts of a number field", () => {
    expect(numberTemplate("###.##")).toEqual({
      type: TemplateType.NUMBER,
      beforeDecimal: 3,
      decimalPoint: true,
      afterDecimal: 2,
    });
  });

  it("reads string fields", () => {
    expect(parseFormatString("!\\  \\&")).toEqual([
      {type: TemplateType.STRING, length: 1},
      {type: TemplateType.STRING, length: 4},
      {type: TemplateType.STRING},
    ]);
  });

  it("counts both backslashes in a fixed-width field", () => {
    expect(parseFormatString("\\\\")).toEqual([{type: TemplateType.STRING, length: 2}]);
  });

  it("treats a + with no digits after it as text", () => {
    expect(parseFormatString("+X")).toEqual([{type: TemplateType.LITERAL, text: '+X'}]);
  });

  it("treats an underscore as an escape", () => {
    expect(parseFormatString("_#")).toEqual([{type: TemplateType.LITERAL, text: '#'}]);
  });
});

describe("formatUsingNumberTemplate", () => {
  it("rounds to the field and pads on the left", () => {
    expect(formatNumber("###.##", 3.14159)).toBe("  3.14");
  });

  it("marks numbers too wide for the field with %", () => {
    expect(formatNumber("##", 123)).toBe("%123");
  });

  it("puts a leading sign before the digits", () => {
    expect(formatNumber("+##", 5)).toBe(" +5");
  });

  it("puts a trailing minus after the digits", () => {
    expect(formatNumber("##.##-", -2.5)).toBe(" 2.50-");
    expect(formatNumber("##.##-", 2.5)).toBe(" 2.50 ");
  });

  it("groups thousands", () => {
    expect(formatNumber("#,###", 1234)).toBe("1,234");
  });

  it("fills with asterisks and floats the dollar sign", () => {
    expect(formatNumber("**$##.##", 3.5)).toBe("***$3.50");
  });

  it("prints fractions without an integer digit when there is no room", () => {
    expect(formatNumber(".##", 0.05)).toBe(".05");
  });

  it("formats exponents", () => {
    expect(formatNumber("##.##^^^^", 1234.5)).toBe(" 1.23E+03");
    expect(formatNumber("##.##^^^^", 0)).toBe(" 0.00E+00");
  });
});

describe("formatUsingStringTemplate", () => {
  it("clips or pads to the field width", () => {
    expect(formatUsingStringTemplate("HELLO", {type: TemplateType.STRING, length: 4})).toBe("HELL");
    expect(formatUsingStringTemplate("HI", {type: TemplateType.STRING, length: 4})).toBe("HI  ");
    expect(formatUsingStringTemplate("HELLO", {type: TemplateType.STRING})).toBe("HELLO");
  });
});
