import { cleanChunkText, isMathBlock, normalizeSurfaceText } from "./text-filter";

describe("isMathBlock", () => {
  it("flags text containing a math token", () => {
    expect(isMathBlock("Let x = 5 for the rest of the section")).toBe(true);
    expect(isMathBlock("A ∪ B contains every element of either set")).toBe(true);
    expect(isMathBlock("\\frac{a}{b} appears in the formula")).toBe(true);
  });

  it("treats lim and exp as math only when they are whole words", () => {
    expect(isMathBlock("Evaluate lim of the sequence as n grows")).toBe(true);
    expect(isMathBlock("The slime mold grows along the limb")).toBe(false);
    expect(isMathBlock("An expert explained the experiment")).toBe(false);
  });

  it("flags symbol-dense text with digits", () => {
    expect(isMathBlock("@@ 12 ## 34")).toBe(true);
  });

  it("flags numbered exercise items", () => {
    expect(isMathBlock("1. Write the order of the matrix")).toBe(true);
    expect(isMathBlock("  3) Write the order of the matrix")).toBe(true);
  });

  it("leaves ordinary prose alone", () => {
    expect(isMathBlock("Probability measures how likely an event is.")).toBe(false);
    expect(isMathBlock("")).toBe(false);
  });
});

describe("normalizeSurfaceText", () => {
  it("normalises line endings, spacing and blank runs", () => {
    expect(normalizeSurfaceText("  a\r\nb  \t c\n\n\n\nd  ")).toBe("a\nb c\n\nd");
  });

  it("removes control characters and maps odd spaces to plain ones", () => {
    expect(normalizeSurfaceText("a\u0000b c")).toBe("ab c");
  });

  it("composes to NFC", () => {
    expect(normalizeSurfaceText("e\u0301te\u0301")).toBe("\u00e9t\u00e9");
  });
});

describe("cleanChunkText", () => {
  it("returns cleaned prose", () => {
    expect(cleanChunkText("A matrix is an ordered array of numbers.... ------ Rows come first.")).toBe(
      "A matrix is an ordered array of numbers. Rows come first.",
    );
  });

  it("drops exercises and numbered items", () => {
    expect(cleanChunkText("Find the inverse of the given square matrix.")).toBe("");
    expect(cleanChunkText("Show that the relation is reflexive and symmetric.")).toBe("");
    expect(cleanChunkText("12. Events that cannot occur together are exclusive.")).toBe("");
  });

  it("drops page furniture and short text", () => {
    expect(cleanChunkText("page 12")).toBe("");
    expect(cleanChunkText("Footer")).toBe("");
    expect(cleanChunkText("Too short to keep")).toBe("");
    expect(cleanChunkText("")).toBe("");
  });
});
