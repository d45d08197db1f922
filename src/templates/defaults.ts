/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

/**
 * XHTML shell wrapped around every page of the book
 */
export function getDefaultPageTemplate(): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="{{language}}" xml:lang="{{language}}">
<head>
  <title>{{title}}</title>
  <link rel="stylesheet" type="text/css" href="{{stylesheet}}"/>
</head>
<body>
{{{body}}}
</body>
</html>
`;
}

/**
 * Credits page shown right after the cover
 */
export function getDefaultCreditsTemplate(): string {
  return `<div class="edition-header">
  <h1 class="edition-title">{{book.title}}</h1>
  <p class="edition-label">{{edition.label}}</p>
</div>
<hr class="edition-rule"/>
<div class="edition-credits">
{{#each book.credits}}
  <p>{{this}}</p>
{{/each}}
</div>
<hr class="edition-rule"/>
<div class="edition-credits">
{{#if book.repositoryUrl}}
  <p>Source: <a href="{{book.repositoryUrl}}">{{book.repositoryUrl}}</a></p>
{{/if}}
  <p>Commit: {{commitLink revision}} &#183; {{revision.dateHuman}}</p>
  <p>Built: {{edition.buildDate}}</p>
</div>
{{#if book.liveUrl}}
<div class="edition-footer">
  <p>For the live version, visit <a href="{{book.liveUrl}}">{{book.liveUrl}}</a>.</p>
</div>
{{/if}}
`;
}

/**
 * Divider page opening each part
 */
export function getDefaultPartTemplate(): string {
  return `<div class="part-title">Part {{number}}</div>
<div class="part-subtitle">{{title}}</div>
`;
}

/**
 * Closing page of the book
 */
export function getDefaultColophonTemplate(): string {
  return `<h1>Colophon</h1>
<p><strong>{{edition.label}}</strong></p>
<p>Built from commit {{commitLink revision}} ({{revision.dateHuman}}).</p>
{{#if book.license}}
<p>{{book.license}}</p>
{{/if}}
{{#if book.liveUrl}}
<p>For the live version, visit <a href="{{book.liveUrl}}">{{book.liveUrl}}</a>.</p>
{{/if}}
<p>Some interactive elements, images, and embedded components from the web version may not render in this format.</p>
`;
}

/**
 * EPUB 3 package document
 */
export function getDefaultPackageTemplate(): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0" unique-identifier="book-id" xml:lang="{{language}}">
  <metadata xmlns:dc="http://purl.org/dc/elements/1.1/">
    <dc:identifier id="book-id">{{identifier}}</dc:identifier>
    <dc:title>{{title}}</dc:title>
    <dc:language>{{language}}</dc:language>
    <dc:creator>{{author}}</dc:creator>
    <dc:description>{{description}}</dc:description>
    <dc:date>{{date}}</dc:date>
{{#if publisher}}
    <dc:publisher>{{publisher}}</dc:publisher>
{{/if}}
    <meta property="dcterms:modified">{{modified}}</meta>
    <meta name="cover" content="cover-image"/>
  </metadata>
  <manifest>
{{#each items}}
    <item id="{{id}}" href="{{href}}" media-type="{{mediaType}}"{{#if properties}} properties="{{properties}}"{{/if}}/>
{{/each}}
  </manifest>
  <spine toc="ncx">
{{#each spine}}
    <itemref idref="{{this}}"/>
{{/each}}
  </spine>
  <guide>
    <reference type="text" title="{{guide.title}}" href="{{guide.href}}"/>
  </guide>
</package>
`;
}

/**
 * EPUB 3 navigation document
 */
export function getDefaultNavTemplate(): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<!DOCTYPE html>
<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops" lang="{{language}}" xml:lang="{{language}}">
<head>
  <title>{{title}}</title>
</head>
<body>
  <nav epub:type="toc" id="toc">
    <h2>{{title}}</h2>
    <ol>
{{#each entries}}
      <li>
        <a href="{{href}}">{{title}}</a>
{{#if children.length}}
        <ol>
{{#each children}}
          <li><a href="{{href}}">{{title}}</a></li>
{{/each}}
        </ol>
{{/if}}
      </li>
{{/each}}
    </ol>
  </nav>
</body>
</html>
`;
}

/**
 * EPUB 2 NCX table of contents, kept for older readers
 */
export function getDefaultNcxTemplate(): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<ncx xmlns="http://www.daisy.org/z3986/2005/ncx/" version="2005-1">
  <head>
    <meta name="dtb:uid" content="{{identifier}}"/>
    <meta name="dtb:depth" content="2"/>
    <meta name="dtb:totalPageCount" content="0"/>
    <meta name="dtb:maxPageNumber" content="0"/>
  </head>
  <docTitle>
    <text>{{title}}</text>
  </docTitle>
  <navMap>
{{#each entries}}
    <navPoint id="nav-{{order}}" playOrder="{{order}}">
      <navLabel><text>{{title}}</text></navLabel>
      <content src="{{href}}"/>
{{#each children}}
      <navPoint id="nav-{{order}}" playOrder="{{order}}">
        <navLabel><text>{{title}}</text></navLabel>
        <content src="{{href}}"/>
      </navPoint>
{{/each}}
    </navPoint>
{{/each}}
  </navMap>
</ncx>
`;
}

export const CONTAINER_XML = `<?xml version="1.0" encoding="utf-8"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>
`;

/**
 * Stylesheet tuned for e-ink readers and reading apps
 */
export function getDefaultStylesheet(): string {
  return `body {
  font-family: Georgia, "Times New Roman", serif;
  line-height: 1.6;
  margin: 1em;
  color: #1a1a1a;
}
h1 {
  font-size: 1.8em;
  margin-top: 1.5em;
  margin-bottom: 0.5em;
  page-break-before: always;
}
h2 {
  font-size: 1.4em;
  margin-top: 1.2em;
  margin-bottom: 0.4em;
}
h3 {
  font-size: 1.15em;
  margin-top: 1em;
  margin-bottom: 0.3em;
}
p {
  margin-bottom: 0.8em;
  text-align: justify;
}
a {
  color: #1d4ed8;
  text-decoration: underline;
}
code {
  font-family: "Courier New", Courier, monospace;
  font-size: 0.9em;
  background-color: #f3f4f6;
  padding: 0.1em 0.3em;
  border-radius: 3px;
}
pre {
  background-color: #f3f4f6;
  padding: 1em;
  overflow-x: auto;
  border-radius: 4px;
  font-size: 0.85em;
  line-height: 1.4;
  margin: 1em 0;
}
pre code {
  background: none;
  padding: 0;
}
blockquote {
  border-left: 3px solid #d1d5db;
  margin-left: 0;
  padding-left: 1em;
  color: #4b5563;
  font-style: italic;
}
img {
  max-width: 100%;
  height: auto;
}
table {
  border-collapse: collapse;
  width: 100%;
  margin: 1em 0;
  font-size: 0.9em;
}
th, td {
  border: 1px solid #d1d5db;
  padding: 0.5em;
  text-align: left;
}
th {
  background-color: #f9fafb;
  font-weight: bold;
}
ul, ol {
  margin-bottom: 0.8em;
  padding-left: 1.5em;
}
li {
  margin-bottom: 0.3em;
}
hr {
  border: none;
  border-top: 1px solid #e5e7eb;
  margin: 2em 0;
}
.part-title {
  font-size: 2em;
  text-align: center;
  margin-top: 3em;
  margin-bottom: 1em;
  font-weight: bold;
}
.part-subtitle {
  text-align: center;
  color: #6b7280;
  font-size: 1.1em;
  margin-bottom: 2em;
}
.edition-header {
  text-align: center;
  margin-top: 6em;
  margin-bottom: 2em;
}
.edition-title {
  font-size: 2em;
  margin-bottom: 0.2em;
  page-break-before: avoid;
}
.edition-label {
  font-size: 1.3em;
  color: #f7a501;
  font-weight: bold;
  margin-bottom: 1.5em;
  text-align: center;
}
.edition-rule {
  width: 40%;
  margin: 0 auto 2em;
}
.edition-credits {
  text-align: center;
  font-size: 0.85em;
  color: #9ca3af;
  line-height: 2;
}
.edition-credits p,
.edition-footer p {
  text-align: center;
}
.edition-footer {
  margin-top: 3em;
  font-size: 0.8em;
  color: #6b7280;
}
.commit {
  font-family: monospace;
}
`;
}
