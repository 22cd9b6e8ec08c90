import fs from 'fs';
import http from 'http';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchFailedError, SourceNotFoundError } from '../../domain/errors.js';
import { HtmlContentExtractor, htmlContentType } from '../HtmlContentExtractor.js';
import { HttpClient, HttpResponse, IHttpClient } from '../HttpClient.js';
import { Logger } from '../logging.js';

const PAGE = `<!DOCTYPE html>
<html lang="en">
<head>
  <title>EIOPA Guidelines on spread risk</title>
  <meta name="description" content="Guidance on the spread risk sub-module">
  <meta name="keywords" content="SCR, spread , rating">
  <meta name="author" content="Test Author">
  <style>.hidden { display: none; }</style>
</head>
<body>
  <header>Site header</header>
  <nav><a href="/home">Home page</a></nav>
  <h1>Spread risk</h1>
  <p>Article 176 sets the <b>stress factor</b>.</p>
  <h2>Ratings</h2>
  <table>
    <tr><th>Rating</th><th>Factor</th></tr>
    <tr><td>AAA</td><td>0.9%</td></tr>
  </table>
  <a href="/docs/annex.html">Annex I text</a>
  <a href="https://other.example.org/x">ok</a>
  <script>var ignored = 1;</script>
  <footer>Footer text</footer>
</body>
</html>`;

const TITLE = 'Règlement délégué solvabilité';

function latin1Page(head = ''): Buffer {
  return Buffer.from(`<html><head>${head}<title>${TITLE}</title></head><body><p>${TITLE}</p></body></html>`, 'latin1');
}

function fakeClient(body: string) {
  const response: HttpResponse = { statusCode: 200, headers: {}, body: Buffer.from(body), timeTaken: 1 };
  return { get: vi.fn(async (_url: string) => response) };
}

describe('HtmlContentExtractor', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scrkb-html-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('extracts text, metadata and structure from a web page', async () => {
    const client = fakeClient(PAGE);
    const extractor = new HtmlContentExtractor(client, Logger.silent());

    const content = await extractor.extract({ origin: 'url', format: 'html', url: 'https://eiopa.example.org/gl/spread' });

    expect(client.get).toHaveBeenCalledWith('https://eiopa.example.org/gl/spread');
    expect(content.textContent).toBe(
      [
        'EIOPA Guidelines on spread risk',
        'Spread risk',
        'Article 176 sets the',
        'stress factor',
        '.',
        'Ratings',
        'Rating',
        'Factor',
        'AAA',
        '0.9%',
        'Annex I text',
        'ok'
      ].join('\n')
    );
    expect(content.metadata).toEqual({
      title: 'EIOPA Guidelines on spread risk',
      description: 'Guidance on the spread risk sub-module',
      keywords: ['SCR', 'spread', 'rating'],
      author: 'Test Author',
      language: 'en'
    });
    expect(content.auxiliary.headings).toEqual([
      { level: 1, text: 'Spread risk' },
      { level: 2, text: 'Ratings' }
    ]);
    expect(content.auxiliary.tables).toEqual([
      {
        index: 0,
        rows: [
          ['Rating', 'Factor'],
          ['AAA', '0.9%']
        ]
      }
    ]);
    expect(content.auxiliary.links).toEqual([{ text: 'Annex I text', url: 'https://eiopa.example.org/docs/annex.html' }]);
    expect(content.statistics.linkCount).toBe(1);
    expect(content.statistics.tableCount).toBe(1);
    expect(content.statistics.headingCount).toBe(2);
    expect(content.fileInfo).toBeUndefined();
  });

  it('caps the number of links kept', async () => {
    const anchors = Array.from({ length: 5 }, (_, i) => `<a href="/p${i}">Page ${i}</a>`).join('');
    const extractor = new HtmlContentExtractor(fakeClient(`<html><body>${anchors}</body></html>`), Logger.silent(), {
      maxLinks: 2
    });

    const content = await extractor.extract({ origin: 'url', format: 'html', url: 'https://example.org/' });

    expect(content.auxiliary.links).toEqual([
      { text: 'Page 0', url: 'https://example.org/p0' },
      { text: 'Page 1', url: 'https://example.org/p1' }
    ]);
    expect(content.statistics.linkCount).toBe(5);
  });

  it('reads a local file and reports file information', async () => {
    const file = path.join(dir, 'guidelines.html');
    fs.writeFileSync(file, PAGE);
    const client = fakeClient('');
    const extractor = new HtmlContentExtractor(client, Logger.silent());

    const content = await extractor.extract({ origin: 'file', format: 'html', path: file });

    expect(client.get).not.toHaveBeenCalled();
    expect(content.fileInfo?.name).toBe('guidelines.html');
    expect(content.fileInfo?.extension).toBe('.html');
    expect(content.auxiliary.links).toEqual([{ text: 'Annex I text', url: '/docs/annex.html' }]);
  });

  it('decodes a local file using its meta charset', async () => {
    const file = path.join(dir, 'reglement.html');
    fs.writeFileSync(file, latin1Page('<meta charset="iso-8859-1">'));
    const extractor = new HtmlContentExtractor(fakeClient(''), Logger.silent());

    const content = await extractor.extract({ origin: 'file', format: 'html', path: file });

    expect(content.metadata.title).toBe(TITLE);
    expect(content.textContent).toBe(`${TITLE}\n${TITLE}`);
  });

  it('keeps every element when no selector is ignored', async () => {
    const extractor = new HtmlContentExtractor(
      fakeClient('<html><body><p>Body</p><script>var kept = 1;</script></body></html>'),
      Logger.silent(),
      { ignoreSelectors: [] }
    );

    const content = await extractor.extract({ origin: 'url', format: 'html', url: 'https://example.org/' });

    expect(content.textContent).toBe('Body\nvar kept = 1;');
  });

  it('fails with SourceNotFoundError for a missing file', async () => {
    const extractor = new HtmlContentExtractor(fakeClient(''), Logger.silent());

    await expect(
      extractor.extract({ origin: 'file', format: 'html', path: path.join(dir, 'missing.html') })
    ).rejects.toBeInstanceOf(SourceNotFoundError);
  });

  it('lets fetch failures through', async () => {
    const client: IHttpClient = {
      get: async url => {
        throw new FetchFailedError(url, 'HTTP error 404 (Not Found)', 404);
      }
    };
    const extractor = new HtmlContentExtractor(client, Logger.silent());

    await expect(extractor.extract({ origin: 'url', format: 'html', url: 'https://example.org/gone' })).rejects.toMatchObject(
      { errorCode: 'FETCH_FAILED', statusCode: 404 }
    );
  });
});

describe('HtmlContentExtractor over HTTP', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = http.createServer((request, response) => {
      if (request.url === '/declared') {
        response.writeHead(200, { 'Content-Type': 'text/html; charset=iso-8859-1' });
        response.end(latin1Page());
      } else {
        response.writeHead(200, { 'Content-Type': 'text/html' });
        response.end(latin1Page('<meta http-equiv="Content-Type" content="text/html; charset=iso-8859-1">'));
      }
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server has no port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('decodes a Latin-1 page using the charset from the header', async () => {
    const extractor = new HtmlContentExtractor(new HttpClient(Logger.silent()), Logger.silent());

    const content = await extractor.extract({ origin: 'url', format: 'html', url: `${baseUrl}/declared` });

    expect(content.metadata.title).toBe(TITLE);
    expect(content.textContent).toBe(`${TITLE}\n${TITLE}`);
  });

  it('falls back to the meta charset when the header has none', async () => {
    const extractor = new HtmlContentExtractor(new HttpClient(Logger.silent()), Logger.silent());

    const content = await extractor.extract({ origin: 'url', format: 'html', url: `${baseUrl}/meta` });

    expect(content.metadata.title).toBe(TITLE);
  });
});

describe('htmlContentType', () => {
  it('carries the declared charset over', () => {
    expect(htmlContentType(Buffer.from('abc'), 'text/html; charset="ISO-8859-1"')).toBe('text/html; charset=ISO-8859-1');
  });

  it('treats undeclared valid UTF-8 as UTF-8', () => {
    expect(htmlContentType(Buffer.from(TITLE, 'utf-8'), 'text/html')).toBe('text/html; charset=utf-8');
  });

  it('leaves other undeclared bytes to sniffing', () => {
    expect(htmlContentType(Buffer.from(TITLE, 'latin1'))).toBe('text/html');
  });
});
