import { chunkProse, unwrapLines } from "./chunker";

describe("unwrapLines", () => {
  it("joins wrapped lines and undoes hyphenation", () => {
    expect(unwrapLines("A function is differen-\ntiable when\n  its derivative exists.")).toBe(
      "A function is differentiable when its derivative exists.",
    );
  });

  it("keeps hyphens before capitals", () => {
    expect(unwrapLines("Cauchy-\nSchwarz")).toBe("Cauchy- Schwarz");
  });
});

describe("chunkProse", () => {
  it("keeps a short block whole", () => {
    expect(chunkProse("One short\nparagraph.")).toEqual(["One short paragraph."]);
  });

  it("packs sentences up to the limit", () => {
    expect(chunkProse("First sentence is here. Second sentence follows it. Third.", 40)).toEqual([
      "First sentence is here.",
      "Second sentence follows it. Third.",
    ]);
  });

  it("splits an oversized sentence at word boundaries", () => {
    expect(chunkProse("alpha beta gamma delta epsilon", 12)).toEqual(["alpha beta", "gamma delta", "epsilon"]);
  });

  it("returns nothing for blank input", () => {
    expect(chunkProse(" \n ")).toEqual([]);
  });
});
