import { cleanText, JatsExtractor } from "../src/extract";
import { JATS_FULL_TEXT, jatsArticle } from "./fixtures";

describe("cleanText", () => {
  it("removes numeric citation markers and the space they leave", () => {
    expect(cleanText("Results  [1, 2] are\n good [3].")).toBe("Results are good.");
    expect(cleanText("Range [4-6] and [7–9] end")).toBe("Range and end");
  });

  it("collapses runs of periods and spaces before punctuation", () => {
    expect(cleanText("Wait... what ?")).toBe("Wait. what?");
  });

  it("keeps bracketed text that is not a citation", () => {
    expect(cleanText("Dose [high] group")).toBe("Dose [high] group");
  });

  it("returns an empty string for empty input", () => {
    expect(cleanText("")).toBe("");
  });
});

describe("JatsExtractor", () => {
  const extractor = new JatsExtractor({ minBodyChars: 20 });

  it("extracts front matter, body sections and captions", () => {
    const record = extractor.extract(jatsArticle("424242"), "fallback");

    expect(record).toEqual({
      identifier: "PMC424242",
      title: "Bile acids and liver injury",
      abstract: "Background: Bile acids accumulate. Results: Injury was reduced.",
      keywords: ["bile acid", "cholestasis"],
      journal: "Journal of Test Hepatology",
      sections: [
        { title: "Background details", text: "Earlier models were limited." },
        { title: "Introduction", text: "Cholestatic injury is common in clinical practice." },
        { title: "Methods", text: "Mice were dosed daily." },
      ],
      figureCaptions: ["Figure 1: Liver sections after treatment."],
      tableCaptions: [],
      fullText: JATS_FULL_TEXT,
      textLength: JATS_FULL_TEXT.length,
    });
  });

  it("keeps an identifier that already carries the prefix", () => {
    const record = extractor.extract(jatsArticle("PMC77"), "fallback");

    expect(record?.identifier).toBe("PMC77");
  });

  it("falls back to the given identifier without an article id", () => {
    const markup = jatsArticle("1").replace('<article-id pub-id-type="pmc">1</article-id>', "");

    expect(extractor.extract(markup, "PMC555")?.identifier).toBe("PMC555");
  });

  it("skips documents whose body is too short", () => {
    expect(new JatsExtractor({ minBodyChars: 500 }).extract(jatsArticle("1"), "PMC1")).toBeUndefined();
  });

  it("skips documents without article metadata", () => {
    const markup = "<article><body><p>Plenty of body text that would otherwise be long enough.</p></body></article>";

    expect(extractor.extract(markup, "PMC1")).toBeUndefined();
    expect(extractor.extract("<pmc-articleset/>", "PMC1")).toBeUndefined();
  });

  it("orders nested sections ahead of their parent and drops those under a skipped one", () => {
    const markup = `<article><front><article-meta><article-title>Layered</article-title></article-meta></front>
      <body>
        <sec><title>Results</title><p>Outer findings.</p>
          <sec><title>Cohort A</title><p>First cohort.</p>
            <sec><title>Subgroup</title><p>Smaller group.</p></sec>
          </sec>
        </sec>
        <sec><title>Acknowledgements</title><sec><title>Thanks</title><p>Placeholder thanks.</p></sec></sec>
      </body></article>`;

    const record = extractor.extract(markup, "PMC8");

    expect(record?.sections).toEqual([
      { title: "Subgroup", text: "Smaller group." },
      { title: "Cohort A", text: "First cohort." },
      { title: "Results", text: "Outer findings." },
    ]);
  });

  it("uses top-level body paragraphs when there are no sections", () => {
    const markup = `<article><front><article-meta><article-title>Short note</article-title>
      <abstract><p>First part.</p><p>Second part.</p></abstract></article-meta></front>
      <body><p>Only a paragraph of body text.</p><p>And one more.</p></body></article>`;

    const record = extractor.extract(markup, "PMC9");

    expect(record?.abstract).toBe("First part. Second part.");
    expect(record?.sections).toEqual([{ title: "", text: "Only a paragraph of body text. And one more." }]);
    expect(record?.fullText).toBe(
      "Title: Short note\n\nAbstract: First part. Second part.\n\nOnly a paragraph of body text. And one more.",
    );
  });
});
