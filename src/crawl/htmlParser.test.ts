import { load } from "cheerio";
import { extractCellText, extractMarkedTable } from "./htmlParser";

const LIST_PAGE = `<html><body>
<table class="infobox"><tr><th>IATA</th></tr><tr><td>ZZ</td></tr></table>
<table class="wikitable sortable"><tr><th>ICAO</th><th>Airline</th></tr><tr><td>AAA</td><td>Foo</td></tr></table>
<table class="wikitable"><tbody>
<tr><th> iata </th><th>ICAO</th><th>Airline</th></tr>
<tr><td>AA</td><td>AAL</td><td><a href="/wiki/American">American</a>
   <span>Airlines</span><sup>[1]</sup></td></tr>
<tr><th colspan="3">Section break</th></tr>
<tr><td>BB</td><td>BBB</td></tr>
</tbody></table>
<table class="wikitable"><tr><th>IATA</th></tr><tr><td>CC</td></tr></table>
</body></html>`;

describe("extractCellText", () => {
  test("separates nested text nodes with a single space", () => {
    const $ = load("<div>Air<b>Line</b>\n\n <i> Co </i></div>");
    expect(extractCellText($, $("div"))).toBe("Air Line Co");
  });

  test("returns an empty string for an empty cell", () => {
    const $ = load("<table><tr><td></td></tr></table>");
    expect(extractCellText($, $("td"))).toBe("");
  });
});

describe("extractMarkedTable", () => {
  test("returns the first wikitable whose header has the marker", () => {
    const table = extractMarkedTable(LIST_PAGE, "IATA");

    expect(table).toEqual({
      header: ["iata", "ICAO", "Airline"],
      rows: [
        ["AA", "AAL", "American Airlines [1]"],
        ["BB", "BBB"],
      ],
    });
  });

  test("returns undefined when no wikitable has the marker column", () => {
    const html = `<html><body>
      <table class="wikitable"><tr><th>ICAO</th></tr><tr><td>AAL</td></tr></table>
      <table class="infobox"><tr><th>IATA</th></tr></table>
    </body></html>`;

    expect(extractMarkedTable(html, "IATA")).toBeUndefined();
  });

  test("returns undefined for a document without tables", () => {
    expect(extractMarkedTable("<p>nothing here</p>", "IATA")).toBeUndefined();
  });

  test("reads header cells written as td", () => {
    const html = `<table class="wikitable"><tr><td>IATA</td><td>Name</td></tr><tr><td>QF</td><td>Qantas</td></tr></table>`;

    expect(extractMarkedTable(html, "IATA")).toEqual({
      header: ["IATA", "Name"],
      rows: [["QF", "Qantas"]],
    });
  });

  test("yields a header with no rows when the table has only a header", () => {
    const html = `<table class="wikitable"><tr><th>IATA</th></tr></table>`;

    expect(extractMarkedTable(html, "IATA")).toEqual({ header: ["IATA"], rows: [] });
  });
});
