import { load, type Cheerio, type CheerioAPI } from "cheerio";
import { isTag, isText, type AnyNode, type Element } from "domhandler";
import { BodySection, CorpusRecord } from "../types";
import { MarkupExtractor } from "./markupExtractor";
import { cleanText } from "./textCleaner";

export interface JatsExtractorOptions {
  minBodyChars: number;
}

/** Inline elements that only contribute their leading text. */
const SHALLOW_TAGS = new Set(["xref", "ext-link", "uri", "sup", "sub"]);
const DROPPED_TAGS = new Set(["graphic", "media", "inline-graphic"]);

const SKIPPED_SECTION_TITLES = new Set([
  "competing interests",
  "conflict of interest",
  "conflicts of interest",
  "credit authorship contribution statement",
  "authorship contribution",
  "declaration of competing interest",
  "author contributions",
  "funding",
  "acknowledgements",
  "acknowledgments",
  "acknowledgment",
  "data availability",
  "supplementary material",
  "supplementary data",
  "abbreviations",
  "ethics statement",
  "ethical approval",
]);

const MIN_CAPTION_CHARS = 10;

function leadingText(element: Element): string {
  const first = element.children[0];
  return first && isText(first) ? first.data : "";
}

export function nodeText(node: AnyNode | undefined): string {
  if (!node) {
    return "";
  }
  if (isText(node)) {
    return node.data;
  }
  if (!isTag(node)) {
    return "";
  }

  const parts: string[] = [];
  for (const child of node.children) {
    if (isText(child)) {
      parts.push(child.data);
      continue;
    }
    if (!isTag(child)) {
      continue;
    }
    const name = child.name.toLowerCase();
    if (DROPPED_TAGS.has(name)) {
      continue;
    }
    parts.push(SHALLOW_TAGS.has(name) ? leadingText(child) : nodeText(child));
  }
  return parts.join("");
}

function textOf(selection: Cheerio<Element>): string {
  return nodeText(selection.get(0)).trim();
}

function paragraphsOf(selection: Cheerio<Element>): string[] {
  return selection
    .toArray()
    .map((paragraph) => nodeText(paragraph).trim())
    .filter((text) => text.length > 0);
}

/**
 * Turns a JATS (PMC article XML) document into a corpus record: front-matter
 * fields, body sections minus boilerplate, and figure and table captions.
 */
export class JatsExtractor implements MarkupExtractor {
  private readonly options: JatsExtractorOptions;

  constructor(options: JatsExtractorOptions) {
    this.options = options;
  }

  extract(markup: string, fallbackIdentifier: string): CorpusRecord | undefined {
    const $ = load(markup, { xml: true });
    const article = $("article").first();
    if (article.length === 0) {
      return undefined;
    }
    const meta = article.find("article-meta").first();
    if (meta.length === 0) {
      return undefined;
    }

    const rawSections = this.extractBody($, article);
    const bodyChars = rawSections.reduce((total, section) => total + section.text.length, 0);
    if (bodyChars < this.options.minBodyChars) {
      return undefined;
    }

    const title = cleanText(textOf(meta.find("article-title").first()));
    const abstract = cleanText(this.extractAbstract($, meta));
    const keywords = meta
      .find("kwd")
      .toArray()
      .map((keyword) => nodeText(keyword).trim())
      .filter((keyword) => keyword.length > 0);
    const journalScope = $("journal-meta").first();
    const journal = textOf((journalScope.length > 0 ? journalScope : meta).find("journal-title").first());
    const identifier = this.extractIdentifier($, meta) || fallbackIdentifier;
    const sections = rawSections.map((section) => ({ title: section.title, text: cleanText(section.text) }));
    const figureCaptions = this.extractCaptions($, article, "fig").map(cleanText);
    const tableCaptions = this.extractCaptions($, article, "table-wrap").map(cleanText);

    const fullText = buildFullText({ title, abstract, keywords, sections, figureCaptions, tableCaptions });
    return {
      identifier,
      title,
      abstract,
      keywords,
      journal,
      sections,
      figureCaptions,
      tableCaptions,
      fullText,
      textLength: fullText.length,
    };
  }

  private extractIdentifier($: CheerioAPI, meta: Cheerio<Element>): string {
    for (const element of meta.find("article-id").toArray()) {
      const type = $(element).attr("pub-id-type");
      const value = nodeText(element).trim();
      if (!value) {
        continue;
      }
      if (type === "pmcid") {
        return value;
      }
      if (type === "pmc") {
        return value.toUpperCase().startsWith("PMC") ? value : `PMC${value}`;
      }
    }
    return "";
  }

  private extractAbstract($: CheerioAPI, meta: Cheerio<Element>): string {
    const abstract = meta.find("abstract").first();
    if (abstract.length === 0) {
      return "";
    }

    const sections = abstract.find("sec").toArray();
    if (sections.length > 0) {
      const parts: string[] = [];
      for (const element of sections) {
        const section = $(element);
        const heading = textOf(section.children("title").first());
        const body = paragraphsOf(section.find("p")).join(" ");
        if (heading && body) {
          parts.push(`${heading}: ${body}`);
        } else if (body) {
          parts.push(body);
        }
      }
      return parts.join(" ");
    }

    const paragraphs = paragraphsOf(abstract.find("p"));
    if (paragraphs.length > 0) {
      return paragraphs.join(" ");
    }
    return textOf(abstract);
  }

  private extractBody($: CheerioAPI, article: Cheerio<Element>): BodySection[] {
    const body = article.find("body").first();
    if (body.length === 0) {
      return [];
    }

    const sections: BodySection[] = [];
    const visit = (section: Cheerio<Element>): void => {
      const title = textOf(section.children("title").first());
      if (SKIPPED_SECTION_TITLES.has(title.toLowerCase())) {
        return;
      }
      // Nested sections land ahead of the paragraphs of the section holding them.
      for (const nested of section.children("sec").toArray()) {
        visit($(nested));
      }
      const paragraphs = paragraphsOf(section.children("p"));
      if (paragraphs.length > 0) {
        sections.push({ title, text: paragraphs.join(" ") });
      }
    };

    for (const element of body.children("sec").toArray()) {
      visit($(element));
    }

    if (sections.length === 0) {
      const paragraphs = paragraphsOf(body.children("p"));
      if (paragraphs.length > 0) {
        sections.push({ title: "", text: paragraphs.join(" ") });
      }
    }
    return sections;
  }

  private extractCaptions($: CheerioAPI, article: Cheerio<Element>, tag: "fig" | "table-wrap"): string[] {
    const captions: string[] = [];
    for (const element of article.find(tag).toArray()) {
      const container = $(element);
      const caption = container.children("caption").first();
      if (caption.length === 0) {
        continue;
      }
      const label = textOf(container.children("label").first());
      const text = textOf(caption);
      if (text.length <= MIN_CAPTION_CHARS) {
        continue;
      }
      captions.push(label ? `${label}: ${text}` : text);
    }
    return captions;
  }
}

export function buildFullText(parts: {
  title: string;
  abstract: string;
  keywords: string[];
  sections: BodySection[];
  figureCaptions: string[];
  tableCaptions: string[];
}): string {
  const lines: string[] = [];
  if (parts.title) {
    lines.push(`Title: ${parts.title}`);
  }
  if (parts.abstract) {
    lines.push(`\nAbstract: ${parts.abstract}`);
  }
  if (parts.keywords.length > 0) {
    lines.push(`\nKeywords: ${parts.keywords.join(", ")}`);
  }
  for (const section of parts.sections) {
    lines.push(section.title ? `\n${section.title}\n${section.text}` : `\n${section.text}`);
  }
  if (parts.figureCaptions.length > 0) {
    lines.push("\nFigure Descriptions:");
    lines.push(...parts.figureCaptions.map((caption) => `  ${caption}`));
  }
  if (parts.tableCaptions.length > 0) {
    lines.push("\nTable Descriptions:");
    lines.push(...parts.tableCaptions.map((caption) => `  ${caption}`));
  }
  return lines.join("\n");
}
