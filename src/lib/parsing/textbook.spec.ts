import { extractTextbookChunks, findRunningLines } from "./textbook";

const PAGES = [
  "Chapter 3 Matrices",
  "A matrix is an ordered rectangular array of numbers or functions.",
  "The numbers are called the elements of the matrix.",
  "",
  "12",
  "",
  "Chapter 3 Matrices",
  "If A = [aij] then the order is m × n for the matrix.",
  "",
  "Chapter 3 Matrices",
  "Short line here",
].join("\r\n");

describe("findRunningLines", () => {
  it("finds mid-length lines repeated at least three times", () => {
    expect(findRunningLines(["Header line", "Header line", "Header line", "x", "x", "x", "Once only line"])).toEqual(
      new Set(["Header line"]),
    );
  });
});

describe("extractTextbookChunks", () => {
  it("types headers, formulas and prose", () => {
    expect(extractTextbookChunks(PAGES, "3.pdf")).toEqual([
      { chapter: "3.pdf", text: "Chapter 3 Matrices", type: "excluded" },
      {
        chapter: "3.pdf",
        text: "A matrix is an ordered rectangular array of numbers or functions. The numbers are called the elements of the matrix.",
        type: "text",
      },
      { chapter: "3.pdf", text: "If A = [aij] then the order is m × n for the matrix.", type: "math" },
    ]);
  });

  it("splits long prose into several text chunks", () => {
    const text = "Probability is a measure of how likely an event is. It ranges from zero to one inclusive.";

    expect(extractTextbookChunks(text, "13.pdf", 60)).toEqual([
      { chapter: "13.pdf", text: "Probability is a measure of how likely an event is.", type: "text" },
      { chapter: "13.pdf", text: "It ranges from zero to one inclusive.", type: "text" },
    ]);
  });

  it("returns nothing for empty text", () => {
    expect(extractTextbookChunks("", "1.pdf")).toEqual([]);
  });
});
