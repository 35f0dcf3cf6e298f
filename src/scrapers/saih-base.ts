/**
 * SAIH report download utilities
 * Direct PDF links, and PDFs served behind the ASP.NET image buttons of Informes.aspx
 */

import fetch, { type RequestInit, type Response } from "node-fetch";
import { JSDOM } from "jsdom";
import { DocumentFetchError } from "../errors";

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

export interface DownloadOptions {
  fetchImpl?: HttpFetch;
  timeoutMs?: number;
}

const USER_AGENT = "Mozilla/5.0 (compatible; SaihRainfallBot/1.0)";
const DEFAULT_TIMEOUT_MS = 30_000;

function baseHeaders(extra: Record<string, string> = {}): Record<string, string> {
  return { "User-Agent": USER_AGENT, Accept: "*/*", ...extra };
}

/** Cookie header carrying the session cookies a response set */
function sessionCookies(res: Response): string | null {
  const setCookie = res.headers.raw()["set-cookie"] ?? [];
  const pairs = setCookie.map(c => c.split(";")[0].trim()).filter(Boolean);
  return pairs.length > 0 ? pairs.join("; ") : null;
}

export function looksLikePdf(contentType: string, body: Buffer): boolean {
  return contentType.toLowerCase().includes("pdf") || body.subarray(0, 4).toString("latin1") === "%PDF";
}

async function request(url: string, init: RequestInit, options: DownloadOptions): Promise<Response> {
  const doFetch = options.fetchImpl ?? fetch;
  let res: Response;
  try {
    res = await doFetch(url, { timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS, ...init });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DocumentFetchError(`Request to ${url} failed: ${reason}`, url);
  }
  if (!res.ok) {
    throw new DocumentFetchError(`Failed to fetch ${url}: ${res.status} ${res.statusText}`, url, res.status);
  }
  return res;
}

/**
 * Download a PDF from a direct link. Error pages come back as HTML with a 200,
 * so the body is checked as well as the status.
 */
export async function downloadPdfDirect(url: string, options: DownloadOptions = {}): Promise<Buffer> {
  const res = await request(url, { headers: baseHeaders() }, options);
  const body = await res.buffer();
  const contentType = res.headers.get("content-type") ?? "";

  if (!looksLikePdf(contentType, body)) {
    throw new DocumentFetchError(`Download from ${url} is not a PDF (Content-Type=${contentType || "none"})`, url, res.status);
  }

  console.log(`✅ Downloaded PDF: ${url} (${body.length} bytes)`);
  return body;
}

/** Hidden ASP.NET state fields of the first form on the page */
export function readFormState(html: string): Record<string, string> {
  const { document } = new JSDOM(html).window;
  const field = (name: string) => document.querySelector(`input[name="${name}"]`)?.getAttribute("value") ?? null;

  const viewState = field("__VIEWSTATE");
  const eventValidation = field("__EVENTVALIDATION");
  if (viewState === null) throw new Error("Hidden field __VIEWSTATE not found in page");
  if (eventValidation === null) throw new Error("Hidden field __EVENTVALIDATION not found in page");

  const state: Record<string, string> = {
    __EVENTTARGET: "",
    __EVENTARGUMENT: "",
    __VIEWSTATE: viewState,
    __EVENTVALIDATION: eventValidation,
  };

  const generator = field("__VIEWSTATEGENERATOR");
  if (generator !== null) state.__VIEWSTATEGENERATOR = generator;

  return state;
}

/** First link to a .pdf in an HTML page, resolved against the page URL */
export function findPdfLink(html: string, pageUrl: string): string | null {
  const { document } = new JSDOM(html).window;
  for (const a of Array.from(document.querySelectorAll("a[href]"))) {
    const href = a.getAttribute("href") ?? "";
    if (/\.pdf(?:$|[?#])/i.test(href)) return new URL(href, pageUrl).toString();
  }
  return null;
}

/**
 * Simulate a click on an image button of an ASP.NET page.
 * `buttonName` is the input NAME (e.g. "ctl00$ContentPlaceHolder1$But_Llu7dpdf");
 * image buttons post the click coordinates as `<name>.x` and `<name>.y`.
 */
export async function downloadPdfFromInformes(
  pageUrl: string,
  buttonName: string,
  options: DownloadOptions = {}
): Promise<Buffer> {
  // 1) GET to capture VIEWSTATE / EVENTVALIDATION and the session cookie
  const page = await request(pageUrl, { headers: baseHeaders() }, options);
  const html = await page.text();
  const cookie = sessionCookies(page);

  let state: Record<string, string>;
  try {
    state = readFormState(html);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DocumentFetchError(`${reason} (${pageUrl})`, pageUrl);
  }

  const form = new URLSearchParams({ ...state, [`${buttonName}.x`]: "10", [`${buttonName}.y`]: "10" });
  const headers = baseHeaders({
    "Content-Type": "application/x-www-form-urlencoded",
    ...(cookie ? { Cookie: cookie } : {}),
  });

  // 2) POST the click
  const res = await request(pageUrl, { method: "POST", headers, body: form.toString() }, options);
  const body = await res.buffer();
  const contentType = res.headers.get("content-type") ?? "";

  if (looksLikePdf(contentType, body)) {
    console.log(`✅ Downloaded PDF via postback: ${buttonName} (${body.length} bytes)`);
    return body;
  }

  // 3) Some responses are an HTML page linking to the generated PDF
  if (contentType.toLowerCase().includes("text/html")) {
    const link = findPdfLink(body.toString("utf8"), pageUrl);
    if (link) {
      const pdf = await request(link, { headers: baseHeaders(cookie ? { Cookie: cookie } : {}) }, options);
      const pdfBody = await pdf.buffer();
      if (looksLikePdf(pdf.headers.get("content-type") ?? "", pdfBody)) {
        console.log(`✅ Downloaded PDF via link: ${link} (${pdfBody.length} bytes)`);
        return pdfBody;
      }
    }
  }

  throw new DocumentFetchError(`Could not get the PDF from ${pageUrl} (non-PDF response)`, pageUrl, res.status);
}
