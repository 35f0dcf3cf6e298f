import { Headers, Response } from "node-fetch";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DocumentFetchError } from "../errors";
import {
  downloadPdfDirect,
  downloadPdfFromInformes,
  findPdfLink,
  looksLikePdf,
  readFormState,
  type HttpFetch,
} from "./saih-base";

const PAGE_URL = "https://saih.example/saih/Informes.aspx";
const PDF_URL = "https://saih.example/saih/tmp/LLuvia_diaria.pdf";
const BUTTON = "ctl00$ContentPlaceHolder1$But_Llu7dpdf";
const PDF_BYTES = "%PDF-1.4 test";

const FORM_PAGE = `<html><body><form method="post" action="./Informes.aspx">
  <input type="hidden" name="__VIEWSTATE" value="vs-123" />
  <input type="hidden" name="__VIEWSTATEGENERATOR" value="gen-1" />
  <input type="hidden" name="__EVENTVALIDATION" value="ev-456" />
  <input type="image" name="${BUTTON}" src="pdf.png" />
</form></body></html>`;

const pdfResponse = () => new Response(PDF_BYTES, { status: 200, headers: { "Content-Type": "application/pdf" } });

const htmlResponse = (html: string, cookies: string[] = []) => {
  const headers = new Headers({ "Content-Type": "text/html; charset=utf-8" });
  for (const c of cookies) headers.append("Set-Cookie", c);
  return new Response(html, { status: 200, headers });
};

describe("saih-base", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("looksLikePdf", () => {
    it("accepts a PDF content type or the %PDF magic bytes", () => {
      expect(looksLikePdf("application/pdf", Buffer.from("x"))).toBe(true);
      expect(looksLikePdf("application/octet-stream", Buffer.from(PDF_BYTES))).toBe(true);
      expect(looksLikePdf("text/html", Buffer.from("<html>"))).toBe(false);
    });
  });

  describe("downloadPdfDirect", () => {
    it("returns the PDF body", async () => {
      const fetchImpl = vi.fn<HttpFetch>().mockResolvedValue(pdfResponse());

      const pdf = await downloadPdfDirect(PDF_URL, { fetchImpl, timeoutMs: 5000 });

      expect(pdf.toString("latin1")).toBe(PDF_BYTES);
      expect(fetchImpl).toHaveBeenCalledWith(PDF_URL, expect.objectContaining({ timeout: 5000 }));
    });

    it("rejects an HTML error page served with status 200", async () => {
      const fetchImpl = vi.fn<HttpFetch>().mockResolvedValue(htmlResponse("<html>Error</html>"));

      await expect(downloadPdfDirect(PDF_URL, { fetchImpl })).rejects.toThrow(
        `Download from ${PDF_URL} is not a PDF (Content-Type=text/html; charset=utf-8)`
      );
    });

    it("carries the HTTP status of a failed response", async () => {
      const fetchImpl = vi
        .fn<HttpFetch>()
        .mockResolvedValue(new Response("missing", { status: 404, statusText: "Not Found" }));

      const error = await downloadPdfDirect(PDF_URL, { fetchImpl }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DocumentFetchError);
      expect(error).toMatchObject({ status: 404, url: PDF_URL, message: `Failed to fetch ${PDF_URL}: 404 Not Found` });
    });

    it("wraps network errors", async () => {
      const fetchImpl = vi.fn<HttpFetch>().mockRejectedValue(new Error("ECONNRESET"));

      await expect(downloadPdfDirect(PDF_URL, { fetchImpl })).rejects.toThrow(`Request to ${PDF_URL} failed: ECONNRESET`);
    });
  });

  describe("readFormState", () => {
    it("collects the hidden ASP.NET fields", () => {
      expect(readFormState(FORM_PAGE)).toEqual({
        __EVENTTARGET: "",
        __EVENTARGUMENT: "",
        __VIEWSTATE: "vs-123",
        __EVENTVALIDATION: "ev-456",
        __VIEWSTATEGENERATOR: "gen-1",
      });
    });

    it("requires __EVENTVALIDATION", () => {
      expect(() => readFormState('<input name="__VIEWSTATE" value="vs" />')).toThrow(
        "Hidden field __EVENTVALIDATION not found in page"
      );
    });
  });

  describe("findPdfLink", () => {
    it("resolves the first PDF link against the page URL", () => {
      const html = '<a href="Ayuda.aspx">Ayuda</a><a href="tmp/Lluvia7d.pdf?v=2">Informe</a>';
      expect(findPdfLink(html, PAGE_URL)).toBe("https://saih.example/saih/tmp/Lluvia7d.pdf?v=2");
    });

    it("returns null without a PDF link", () => {
      expect(findPdfLink("<p>Sin informe</p>", PAGE_URL)).toBeNull();
    });
  });

  describe("downloadPdfFromInformes", () => {
    it("posts the image button click with the page state and session cookie", async () => {
      const fetchImpl = vi
        .fn<HttpFetch>()
        .mockResolvedValueOnce(htmlResponse(FORM_PAGE, ["ASP.NET_SessionId=abc; path=/; HttpOnly", "lang=es; path=/"]))
        .mockResolvedValueOnce(pdfResponse());

      const pdf = await downloadPdfFromInformes(PAGE_URL, BUTTON, { fetchImpl });

      expect(pdf.toString("latin1")).toBe(PDF_BYTES);
      expect(fetchImpl).toHaveBeenCalledTimes(2);

      const [url, init] = fetchImpl.mock.calls[1];
      expect(url).toBe(PAGE_URL);
      expect(init).toMatchObject({
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded", Cookie: "ASP.NET_SessionId=abc; lang=es" },
      });

      const form = new URLSearchParams(String(init?.body));
      expect(form.get("__VIEWSTATE")).toBe("vs-123");
      expect(form.get("__EVENTVALIDATION")).toBe("ev-456");
      expect(form.get("__EVENTTARGET")).toBe("");
      expect(form.get(`${BUTTON}.x`)).toBe("10");
      expect(form.get(`${BUTTON}.y`)).toBe("10");
    });

    it("follows a PDF link when the postback answers with HTML", async () => {
      const fetchImpl = vi
        .fn<HttpFetch>()
        .mockResolvedValueOnce(htmlResponse(FORM_PAGE))
        .mockResolvedValueOnce(htmlResponse('<a href="/saih/tmp/Lluvia7d.pdf">Descargar</a>'))
        .mockResolvedValueOnce(pdfResponse());

      const pdf = await downloadPdfFromInformes(PAGE_URL, BUTTON, { fetchImpl });

      expect(pdf.toString("latin1")).toBe(PDF_BYTES);
      expect(fetchImpl.mock.calls[2][0]).toBe("https://saih.example/saih/tmp/Lluvia7d.pdf");
    });

    it("fails when the page has no form state", async () => {
      const fetchImpl = vi.fn<HttpFetch>().mockResolvedValueOnce(htmlResponse("<html>Mantenimiento</html>"));

      await expect(downloadPdfFromInformes(PAGE_URL, BUTTON, { fetchImpl })).rejects.toThrow(
        `Hidden field __VIEWSTATE not found in page (${PAGE_URL})`
      );
      expect(fetchImpl).toHaveBeenCalledTimes(1);
    });

    it("fails when the postback returns neither a PDF nor a link to one", async () => {
      const fetchImpl = vi
        .fn<HttpFetch>()
        .mockResolvedValueOnce(htmlResponse(FORM_PAGE))
        .mockResolvedValueOnce(htmlResponse("<p>Sesión caducada</p>"));

      const error = await downloadPdfFromInformes(PAGE_URL, BUTTON, { fetchImpl }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DocumentFetchError);
      expect(error).toMatchObject({ message: `Could not get the PDF from ${PAGE_URL} (non-PDF response)`, status: 200 });
    });
  });
});
