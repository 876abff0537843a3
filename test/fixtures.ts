/** A small JATS article; `pmcNumber` becomes the `pmc` article id. */
export function jatsArticle(pmcNumber: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<pmc-articleset>
<article article-type="research-article">
  <front>
    <journal-meta>
      <journal-title-group><journal-title>Journal of Test Hepatology</journal-title></journal-title-group>
    </journal-meta>
    <article-meta>
      <article-id pub-id-type="pmid">111</article-id>
      <article-id pub-id-type="pmc">${pmcNumber}</article-id>
      <title-group><article-title>Bile acids and <italic>liver</italic> injury</article-title></title-group>
      <abstract>
        <sec><title>Background</title><p>Bile acids accumulate.</p></sec>
        <sec><title>Results</title><p>Injury was reduced [1].</p></sec>
      </abstract>
      <kwd-group><kwd>bile acid</kwd><kwd> cholestasis </kwd></kwd-group>
    </article-meta>
  </front>
  <body>
    <sec>
      <title>Introduction</title>
      <p>Cholestatic injury is common in clinical practice.</p>
      <sec><title>Background details</title><p>Earlier models were limited.</p></sec>
    </sec>
    <sec><title>Funding</title><p>Funded by a placeholder grant.</p></sec>
    <sec>
      <title>Methods</title>
      <p>Mice were dosed daily [<xref ref-type="bibr" rid="b1">2</xref>].<inline-graphic href="m1.gif"/></p>
      <fig id="f1"><label>Figure 1</label><caption><p>Liver sections after treatment.</p></caption><graphic href="f1.jpg"/></fig>
      <table-wrap id="t1"><label>Table 1</label><caption><p>Doses.</p></caption></table-wrap>
    </sec>
  </body>
</article>
</pmc-articleset>
`;
}

export const JATS_FULL_TEXT = [
  "Title: Bile acids and liver injury",
  "\nAbstract: Background: Bile acids accumulate. Results: Injury was reduced.",
  "\nKeywords: bile acid, cholestasis",
  "\nBackground details\nEarlier models were limited.",
  "\nIntroduction\nCholestatic injury is common in clinical practice.",
  "\nMethods\nMice were dosed daily.",
  "\nFigure Descriptions:",
  "  Figure 1: Liver sections after treatment.",
].join("\n");
