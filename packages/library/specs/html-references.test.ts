import assert from "node:assert/strict";
import { describe, test } from "node:test";

import { discoverReferences } from "../src/discover";
import { extractHtmlReferences } from "../src/html-references";
import type { Reference } from "../src/types";

const summarize = (references: Reference[]) =>
  references.map((reference) => [reference.kind, reference.resolvedUrl]);

const sources = (html: string, references: Reference[]) =>
  references.map((reference) => html.slice(reference.site.start, reference.site.end));

describe("extractHtmlReferences", () => {
  test("finds images, stylesheets, icons and scripts in document order", () => {
    const html = `<!DOCTYPE html>
      <html>
        <head>
          <link rel="stylesheet" href="/style.css">
          <link rel="something_else" href="NOT_ALLOWED">
          <link rel="icon" href="favicon.ico">
          <script src="app.js"></script>
        </head>
        <body>
          <img src="a.png">
          <img src="a.png">
          <img src="data:image/gif;base64,R0lG">
          <a href="#top">top</a>
        </body>
      </html>`;

    const { references, failures } = extractHtmlReferences(html, "http://example.com/page/index.html");

    assert.deepEqual(failures, []);
    assert.deepEqual(summarize(references), [
      ["stylesheet", "http://example.com/style.css"],
      ["image", "http://example.com/page/favicon.ico"],
      ["script", "http://example.com/page/app.js"],
      ["image", "http://example.com/page/a.png"],
      ["image", "http://example.com/page/a.png"]
    ]);
    assert.deepEqual(sources(html, references), [
      'href="/style.css"',
      'href="favicon.ico"',
      'src="app.js"',
      'src="a.png"',
      'src="a.png"'
    ]);
  });

  test("resolves relative paths against the page", () => {
    const html = `
      <img src="../../images/fun.png" />
      <img src="/absolute_path.jpg" />
      <img src="https://static.example.org/logo.svg" />`;

    const { references } = extractHtmlReferences(html, "http://example.com/one/two/three/four/");

    assert.deepEqual(
      references.map((reference) => reference.resolvedUrl),
      [
        "http://example.com/one/two/images/fun.png",
        "http://example.com/absolute_path.jpg",
        "https://static.example.org/logo.svg"
      ]
    );
  });

  test("matches upper-case markup and keeps the attribute name as written", () => {
    const html = '<HTML><HEAD><SCRIPT LANGUAGE="javascript" SRC="/js.js"></SCRIPT></HEAD></HTML>';

    const { references } = extractHtmlReferences(html, "http://example.com/");

    assert.equal(references.length, 1);
    assert.equal(references[0].resolvedUrl, "http://example.com/js.js");
    assert.deepEqual(references[0].site, {
      type: "attribute",
      name: "SRC",
      start: html.indexOf('SRC="/js.js"'),
      end: html.indexOf('SRC="/js.js"') + 'SRC="/js.js"'.length
    });
  });

  test("reads unquoted, single-quoted and entity-encoded values", () => {
    const html = "<img src=pic.png><img src='q.png'><img src=\"a.png?x=1&amp;y=2\">";

    const { references } = extractHtmlReferences(html, "http://example.com/");

    assert.deepEqual(sources(html, references), [
      "src=pic.png",
      "src='q.png'",
      'src="a.png?x=1&amp;y=2"'
    ]);
    assert.deepEqual(
      references.map((reference) => [reference.raw, reference.resolvedUrl]),
      [
        ["pic.png", "http://example.com/pic.png"],
        ["q.png", "http://example.com/q.png"],
        ["a.png?x=1&amp;y=2", "http://example.com/a.png?x=1&y=2"]
      ]
    );
  });

  test("honors <base href>", () => {
    const html = '<head><base href="https://cdn.example.com/assets/"></head><img src="x.png">';

    const { references } = extractHtmlReferences(html, "http://example.com/page.html");

    assert.deepEqual(summarize(references), [["image", "https://cdn.example.com/assets/x.png"]]);
  });

  test("finds url() tokens inside <style> elements", () => {
    const html = "<style>body { background: url('bg.png'); }</style><p>text</p>";

    const { references } = discoverReferences(html, "html", "http://example.com/");

    assert.deepEqual(summarize(references), [["image", "http://example.com/bg.png"]]);
    assert.deepEqual(sources(html, references), ["url('bg.png')"]);
  });

  test("records malformed references without stopping discovery", () => {
    const html = '<img src="http://[invalid"><img src="ok.png">';

    const { references, failures } = extractHtmlReferences(html, "http://example.com/");

    assert.deepEqual(summarize(references), [["image", "http://example.com/ok.png"]]);
    assert.deepEqual(failures, [
      {
        url: "http://[invalid",
        reason: 'Cannot resolve "http://[invalid" against http://example.com/',
        kind: "unresolvable-reference"
      }
    ]);
  });
});
