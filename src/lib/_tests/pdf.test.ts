import { describe, it, expect, vi, beforeEach } from "vitest";
import pdf from "pdf-parse/lib/pdf-parse.js";
import {
  buildChunks,
  cleanDocumentText,
  extractTextFromPDF,
  looksLikePdf,
  splitIntoChunks,
} from "../pdf";
import { ConfigurationError, ExtractionError } from "../errors";

vi.mock("pdf-parse/lib/pdf-parse.js", () => ({ default: vi.fn() }));

const words = (n: number) => Array.from({ length: n }, (_, i) => `w${i}`).join(" ");

describe("splitIntoChunks", () => {
  it("emits overlapping word windows", () => {
    expect([...splitIntoChunks("a b c d e f", 4, 1)]).toEqual(["a b c d", "d e f"]);
  });

  it("keeps every chunk within chunkSize and overlaps full chunks exactly", () => {
    const chunks = [...splitIntoChunks(words(1234), 100, 20)];
    for (const c of chunks) {
      expect(c.split(" ").length).toBeLessThanOrEqual(100);
    }
    for (let i = 1; i < chunks.length; i++) {
      const prev = chunks[i - 1].split(" ");
      const cur = chunks[i].split(" ");
      expect(cur.slice(0, 20)).toEqual(prev.slice(-20));
    }
    expect(chunks[0].startsWith("w0 ")).toBe(true);
    expect(chunks[chunks.length - 1].endsWith("w1233")).toBe(true);
  });

  it("reconstructs the word sequence from the strides", () => {
    const text = words(257);
    const chunks = [...splitIntoChunks(text, 30, 7)];
    const rejoined = chunks.flatMap((c, i) => {
      const w = c.split(" ");
      return i === chunks.length - 1 ? w : w.slice(0, 23);
    });
    expect(rejoined.join(" ")).toBe(text);
  });

  it("can be iterated more than once", () => {
    const iterable = splitIntoChunks(words(30), 10, 2);
    expect([...iterable]).toEqual([...iterable]);
  });

  it("yields nothing for blank text", () => {
    expect([...splitIntoChunks("   \n ", 10, 2)]).toEqual([]);
  });

  it("collapses runs of whitespace between words", () => {
    expect([...splitIntoChunks("one\n\ntwo\t three", 5, 0)]).toEqual(["one two three"]);
  });

  it.each([
    [10, 10],
    [5, 8],
    [0, 0],
    [5, -1],
    [2.5, 1],
  ])("rejects chunkSize=%s overlap=%s", (size, overlap) => {
    expect(() => splitIntoChunks("a b c", size, overlap)).toThrow(ConfigurationError);
  });
});

describe("cleanDocumentText", () => {
  it("collapses whitespace and drops characters other than letters, digits, periods and commas", () => {
    expect(cleanDocumentText("Hello,\n\n world! (test) 3.5%")).toBe("Hello, world test 3.5");
  });
});

describe("buildChunks", () => {
  it("numbers chunks from zero and counts tokens", () => {
    const chunks = buildChunks("one two three", 2, 1);
    expect(chunks.map((c) => c.text)).toEqual(["one two", "two three", "three"]);
    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
    for (const c of chunks) expect(c.tokenCount).toBeGreaterThan(0);
  });

  it("returns an empty list for empty text", () => {
    expect(buildChunks("", 10, 2)).toEqual([]);
  });
});

describe("looksLikePdf", () => {
  it("checks the file header", () => {
    expect(looksLikePdf(Buffer.from("%PDF-1.7\n%binary"))).toBe(true);
    expect(looksLikePdf(Buffer.from("hello world"))).toBe(false);
    expect(looksLikePdf(Buffer.alloc(0))).toBe(false);
  });
});

describe("extractTextFromPDF", () => {
  const parse = vi.mocked(pdf);

  beforeEach(() => {
    parse.mockReset();
  });

  it("returns the trimmed text layer", async () => {
    parse.mockResolvedValueOnce({
      numpages: 1,
      numrender: 1,
      info: {},
      metadata: null,
      version: "default",
      text: "\n  Page one text \n",
    });
    await expect(extractTextFromPDF(Buffer.from("%PDF-"))).resolves.toBe("Page one text");
  });

  it("fails when the PDF has no text layer", async () => {
    parse.mockResolvedValueOnce({
      numpages: 1,
      numrender: 1,
      info: {},
      metadata: null,
      version: "default",
      text: "   ",
    });
    await expect(extractTextFromPDF(Buffer.from("%PDF-"))).rejects.toThrow(
      "No text extracted — PDF may be scanned or image-based"
    );
  });

  it("wraps parser failures", async () => {
    parse.mockRejectedValueOnce(new Error("bad XRef entry"));
    const err = await extractTextFromPDF(Buffer.from("%PDF-")).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExtractionError);
    expect(err).toHaveProperty("message", "Could not read PDF: bad XRef entry");
  });
});
