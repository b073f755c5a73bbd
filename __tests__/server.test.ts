import { afterAll, beforeAll, describe, expect, it } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import request from "supertest";
import type { AppConfig } from "../config";
import { buildDocx, documentXml, paragraphStyle, stylesXml } from "../parser/__tests__/fixtures";
import { createApp } from "../server";

describe("server", () => {
  let uploadDir: string;
  let config: AppConfig;

  beforeAll(() => {
    uploadDir = fs.mkdtempSync(path.join(os.tmpdir(), "docx-uploads-"));
    config = { port: 0, uploadDir, maxUploadBytes: 1024 * 1024, debug: false };
  });

  afterAll(() => {
    fs.rmSync(uploadDir, { recursive: true, force: true });
  });

  it("answers the health check", async () => {
    const response = await request(createApp(config)).get("/api/test");

    expect(response.status).toBe(200);
    expect(response.body.message).toBe("Server is working");
  });

  it("requires a document", async () => {
    const response = await request(createApp(config)).post("/api/paragraphs");

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: "No file uploaded" });
  });

  it("classifies the paragraphs of an uploaded document", async () => {
    const docx = await buildDocx({
      document: documentXml(
        '<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr><w:r><w:t>Minutes</w:t></w:r></w:p>' +
          "<w:p/>" +
          "<w:p><w:r><w:t>Meeting opened at nine.</w:t></w:r></w:p>",
      ),
      styles: stylesXml(paragraphStyle("Heading1", "heading 1")),
    });

    const response = await request(createApp(config))
      .post("/api/paragraphs")
      .attach("document", docx, "minutes.docx");

    expect(response.status).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.blocks).toEqual([
      {
        type: "HEADING",
        text: "Minutes",
        paragraphIndex: 0,
        inStructuredBlock: false,
        styleId: "Heading1",
        headingLevel: 1,
      },
      { type: "PARAGRAPH", text: "Meeting opened at nine.", paragraphIndex: 2, inStructuredBlock: false },
    ]);
    expect(response.body.summary).toEqual({
      totalParagraphs: 3,
      semanticBlocks: 2,
      counts: { HEADING: 1, PARAGRAPH: 1 },
    });
  });

  it("rejects files that are not documents", async () => {
    const response = await request(createApp(config))
      .post("/api/paragraphs")
      .attach("document", Buffer.from("plain text, not a zip"), "notes.docx");

    expect(response.status).toBe(422);
    expect(response.body).toEqual({ error: "Could not open document archive", type: "DocxFormatError" });
  });

  it("rejects uploads over the size limit", async () => {
    const app = createApp({ ...config, maxUploadBytes: 16 });

    const response = await request(app)
      .post("/api/paragraphs")
      .attach("document", Buffer.alloc(64, 1), "large.docx");

    expect(response.status).toBe(413);
  });
});
