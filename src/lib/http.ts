// src/lib/http.ts
import crypto from "crypto";
import { NextRequest, NextResponse } from "next/server";
import { z } from "zod";
import { getContainer } from "./container";
import {
  InvalidRequestError,
  type PipelineError,
  ConfigurationError,
  asPipelineError,
} from "./errors";
import { createLogger } from "./logger";
import { looksLikePdf } from "./pdf";
import type { RetrievalService } from "./retrievalService";

const log = createLogger("http");

export const SESSION_HEADER = "x-session-id";
export const SESSION_COOKIE = "pdfqa_session";

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

export interface HandlerContext {
  service: RetrievalService;
  maxUploadBytes: number;
}

const AskSchema = z.object({
  question: z.string().trim().min(1, "Question is required"),
});

function errorResponse(error: PipelineError): NextResponse {
  return NextResponse.json(
    { status: "error", message: error.message },
    { status: error.httpStatus }
  );
}

function invalid(message: string): NextResponse {
  return errorResponse(new InvalidRequestError(message));
}

/** Session id from the header, then the cookie; null when absent or malformed. */
export function resolveSessionId(req: NextRequest): string | null {
  const candidate =
    req.headers.get(SESSION_HEADER) ?? req.cookies.get(SESSION_COOKIE)?.value;
  return candidate && SESSION_ID_PATTERN.test(candidate) ? candidate : null;
}

function isPdfFile(file: File): boolean {
  return file.type === "application/pdf" || file.name.toLowerCase().endsWith(".pdf");
}

async function withContext(
  resolve: () => Promise<HandlerContext>,
  run: (ctx: HandlerContext) => Promise<NextResponse>
): Promise<NextResponse> {
  let ctx: HandlerContext;
  try {
    ctx = await resolve();
  } catch (err) {
    return errorResponse(
      asPipelineError(
        err,
        (message, cause) =>
          new ConfigurationError(`Service unavailable: ${message}`, { cause })
      )
    );
  }
  return run(ctx);
}

export function createHandlers(resolve: () => Promise<HandlerContext>) {
  async function upload(req: NextRequest): Promise<NextResponse> {
    return withContext(resolve, async ({ service, maxUploadBytes }) => {
      let form: FormData;
      try {
        form = await req.formData();
      } catch (err) {
        log.warn("Unreadable upload body:", err);
        return invalid("Expected a multipart form with a PDF file");
      }

      const file = form.get("file");
      if (!file || typeof file === "string") return invalid("No file uploaded");
      if (!isPdfFile(file)) return invalid("Please upload a PDF file");
      if (file.size > maxUploadBytes) {
        const mb = Math.round((maxUploadBytes / (1024 * 1024)) * 10) / 10;
        return invalid(`File is too large (max ${mb} MB)`);
      }

      const bytes = Buffer.from(await file.arrayBuffer());
      if (!looksLikePdf(bytes)) return invalid("File is not a valid PDF");

      const existing = resolveSessionId(req);
      const sessionId = existing ?? crypto.randomUUID();

      const result = await service.uploadDocument(sessionId, {
        fileName: file.name,
        bytes,
      });
      const res = result.ok
        ? NextResponse.json({
            status: "success",
            message: `PDF processed. ${result.chunkCount} chunks created.`,
            sessionId,
            documentId: result.documentId,
            chunkCount: result.chunkCount,
          })
        : errorResponse(result.error);

      if (!existing) {
        res.cookies.set(SESSION_COOKIE, sessionId, {
          httpOnly: true,
          sameSite: "lax",
          path: "/",
        });
      }
      return res;
    });
  }

  async function ask(req: NextRequest): Promise<NextResponse> {
    return withContext(resolve, async ({ service }) => {
      let body: unknown;
      try {
        body = await req.json();
      } catch (err) {
        log.warn("Unreadable question body:", err);
        return invalid("Expected a JSON body");
      }
      const parsed = AskSchema.safeParse(body);
      if (!parsed.success) {
        return invalid(parsed.error.issues[0]?.message ?? "Invalid request");
      }

      const sessionId = resolveSessionId(req);
      if (!sessionId) {
        return invalid("Missing session. Please upload a PDF first.");
      }

      const result = await service.askQuestion(sessionId, parsed.data.question);
      if (!result.ok) return errorResponse(result.error);
      return NextResponse.json({
        status: "success",
        question: result.question,
        answer: result.answer,
        sources: result.sources,
      });
    });
  }

  async function removeDocument(req: NextRequest): Promise<NextResponse> {
    return withContext(resolve, async ({ service }) => {
      const sessionId = resolveSessionId(req);
      if (!sessionId) return invalid("Missing session");
      const result = await service.deleteDocument(sessionId);
      if (!result.ok) return errorResponse(result.error);
      return NextResponse.json({
        status: "success",
        message: `Deleted ${result.deleted} vectors`,
        deleted: result.deleted,
      });
    });
  }

  async function indexStats(): Promise<NextResponse> {
    return withContext(resolve, async ({ service }) => {
      const result = await service.indexStats();
      if (!result.ok) return errorResponse(result.error);
      return NextResponse.json({ status: "success", stats: result.stats });
    });
  }

  return { upload, ask, removeDocument, indexStats };
}

export function liveness(): NextResponse {
  return NextResponse.json({ message: "PDF Q&A Chatbot Backend", status: "running" });
}

export const handlers = createHandlers(async () => {
  const { config, service } = await getContainer();
  return { service, maxUploadBytes: config.upload.maxBytes };
});
