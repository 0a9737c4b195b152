import { describe, expect, it } from "vitest";
import { extractVisibleText } from "../src/text/htmlText";
import { createTextScanner } from "../src/sources/textScan";
import { defaultTextScanNames } from "../src/countries/catalog";
import { fixture } from "./helpers/http";

describe("HTML visible text extraction", () => {
  it("drops scripts and hidden nodes and keeps cell boundaries", () => {
    const html =
      "<html><head><title>T</title><script>var a = 1;</script></head><body>" +
      "<table><tr><td>Iran</td><td>Not Free</td></tr></table>" +
      "<p hidden>Cuba</p><div>Syria</div></body></html>";
    expect(extractVisibleText(html)).toBe("Iran Not Free Syria");
  });
});

describe("free-text country scan", () => {
  const scanner = createTextScanner(defaultTextScanNames());

  it("finds vocabulary names in a sanctions page in vocabulary order", () => {
    const html = fixture("sanctions_page.html").toString("utf8");
    expect(scanner.scan(html)).toEqual([
      "Belarus",
      "Iran",
      "Burma",
      "Nigeria",
      "North Korea",
      "Syria",
      "Venezuela"
    ]);
  });

  it("matches on word boundaries only", () => {
    const tiny = createTextScanner(["Niger", "Oman", "Mali"]);
    expect(tiny.scan("Nigeria, Romania and Somalia")).toEqual([]);
    expect(tiny.scan("niger; OMAN (Mali)")).toEqual(["Niger", "Oman", "Mali"]);
  });

  it("reports overlapping names independently", () => {
    const tiny = createTextScanner(["Guinea", "Equatorial Guinea", "Papua New Guinea"]);
    expect(tiny.scan("Equatorial Guinea")).toEqual(["Guinea", "Equatorial Guinea"]);
  });

  it("reports a name once even when listed twice in the vocabulary", () => {
    const tiny = createTextScanner(["Iran", "IRAN", "Iraq"]);
    expect(tiny.scan("Iran and Iran again, then Iraq")).toEqual(["Iran", "Iraq"]);
  });
});
