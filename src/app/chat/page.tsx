"use client";
import React, { useRef, useState } from "react";
import { z } from "zod";
import NavBar from "../../components/Navbar";

type Source = { chunkIndex: number; score: number; text: string };

type Message = {
  role: "user" | "ai";
  text: string;
  sources?: Source[];
};

type LoadedDoc = {
  documentId: string;
  fileName: string;
  chunkCount: number;
};

type Toast = {
  id: string;
  message: string;
  type?: "info" | "success" | "error";
};

const ErrorBody = z.object({ status: z.literal("error"), message: z.string() });

const UploadBody = z.object({
  status: z.literal("success"),
  message: z.string(),
  documentId: z.string(),
  chunkCount: z.number(),
});

const AnswerBody = z.object({
  status: z.literal("success"),
  answer: z.string(),
  sources: z.array(
    z.object({ chunkIndex: z.number(), score: z.number(), text: z.string() })
  ),
});

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return { status: "error", message: `Unexpected response (${res.status})` };
  }
}

function errorText(data: unknown, fallback: string): string {
  const parsed = ErrorBody.safeParse(data);
  return parsed.success ? parsed.data.message : fallback;
}

function snippet(text: string, len = 240) {
  const s = text.replace(/\s+/g, " ").trim();
  return s.length <= len ? s : s.slice(0, len) + "…";
}

function isPdf(f: File) {
  return f.type === "application/pdf" || /\.pdf$/i.test(f.name);
}

export default function ChatPage() {
  const [file, setFile] = useState<File | null>(null);
  const [doc, setDoc] = useState<LoadedDoc | null>(null);
  const [question, setQuestion] = useState("");
  const [messages, setMessages] = useState<Message[]>([]);
  const [loadingUpload, setLoadingUpload] = useState(false);
  const [loadingAsk, setLoadingAsk] = useState(false);
  const [deleteLoading, setDeleteLoading] = useState(false);
  const [dragActive, setDragActive] = useState(false);

  const fileInputRef = useRef<HTMLInputElement | null>(null);

  const [toasts, setToasts] = useState<Toast[]>([]);
  const showToast = (
    message: string,
    type: Toast["type"] = "info",
    duration = 4000
  ) => {
    const id = `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
    setToasts((s) => [...s, { id, message, type }]);
    setTimeout(() => {
      setToasts((s) => s.filter((x) => x.id !== id));
    }, duration);
  };

  const resetInput = () => {
    if (fileInputRef.current) fileInputRef.current.value = "";
  };

  const selectFile = (f: File | null) => {
    if (!f) {
      setFile(null);
      return;
    }
    if (!isPdf(f)) {
      showToast("Only PDF files are allowed. Please upload a PDF.", "error");
      resetInput();
      setFile(null);
      return;
    }
    setFile(f);
  };

  const uploadFile = async () => {
    if (!file) {
      showToast("Please select a PDF first.", "error");
      return;
    }
    setLoadingUpload(true);

    try {
      const formData = new FormData();
      formData.append("file", file);
      const res = await fetch("/upload-pdf/", { method: "POST", body: formData });
      const data = await readBody(res);

      const ok = UploadBody.safeParse(data);
      if (ok.success) {
        setDoc({
          documentId: ok.data.documentId,
          fileName: file.name,
          chunkCount: ok.data.chunkCount,
        });
        setMessages([]);
        showToast(ok.data.message, "success");
      } else {
        setDoc(null);
        showToast(`Upload failed: ${errorText(data, "Unknown error")}`, "error");
      }
    } catch (err) {
      console.error("Upload error:", err);
      showToast("Upload failed. Check the console.", "error");
    } finally {
      setLoadingUpload(false);
      setFile(null);
      resetInput();
    }
  };

  const ask = async () => {
    const q = question.trim();
    if (!q) {
      showToast("Please enter a question.", "error");
      return;
    }

    setMessages((prev) => [...prev, { role: "user", text: q }]);
    setQuestion("");
    setLoadingAsk(true);

    try {
      const res = await fetch("/ask-question/", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ question: q }),
      });
      const data = await readBody(res);

      const ok = AnswerBody.safeParse(data);
      const reply: Message = ok.success
        ? { role: "ai", text: ok.data.answer, sources: ok.data.sources }
        : { role: "ai", text: `❌ Error: ${errorText(data, "Unknown error")}` };
      setMessages((prev) => [...prev, reply]);
    } catch (err) {
      console.error("Ask error:", err);
      setMessages((prev) => [
        ...prev,
        { role: "ai", text: "❌ Failed to get an answer. Check the console." },
      ]);
    } finally {
      setLoadingAsk(false);
    }
  };

  const removeDocument = async () => {
    setDeleteLoading(true);
    try {
      const res = await fetch("/document/", { method: "DELETE" });
      const data = await readBody(res);
      if (res.ok) {
        setDoc(null);
        setMessages([]);
        showToast("PDF removed. Its vectors have been deleted.", "success");
      } else {
        showToast(`Delete failed: ${errorText(data, "Unknown error")}`, "error");
      }
    } catch (err) {
      console.error("Delete error:", err);
      showToast("Delete failed. Check the console.", "error");
    } finally {
      setDeleteLoading(false);
    }
  };

  const askDisabled = loadingAsk || loadingUpload || !doc;

  return (
    <main className="min-h-screen bg-gray-50">
      <NavBar />
      <div className="fixed top-4 right-4 z-50 flex flex-col gap-2 pt-16">
        {toasts.map((t) => (
          <div
            key={t.id}
            role="status"
            className={`max-w-sm w-full rounded-lg px-4 py-2 shadow-md text-sm text-white ${
              t.type === "success"
                ? "bg-green-600"
                : t.type === "error"
                ? "bg-red-600"
                : "bg-gray-800"
            }`}
          >
            {t.message}
          </div>
        ))}
      </div>

      <div className="mx-auto max-w-3xl p-6 space-y-6">
        <section className="relative rounded-2xl border bg-white p-4 pb-8">
          <h2 className="font-semibold mb-2">1) Upload a document (PDF)</h2>

          <input
            ref={fileInputRef}
            id="file-upload"
            type="file"
            accept="application/pdf"
            onChange={(e) => selectFile(e.target.files?.[0] ?? null)}
            className="hidden"
            aria-label="Upload PDF"
          />

          {dragActive && (
            <div className="absolute inset-0 z-10 bg-blue-50/80 border-2 border-blue-400 border-dashed rounded-2xl flex items-center justify-center pointer-events-none">
              <p className="text-blue-600 font-semibold">Drop your PDF here</p>
            </div>
          )}

          <label
            htmlFor="file-upload"
            onDragOver={(e) => {
              e.preventDefault();
              setDragActive(true);
            }}
            onDragLeave={() => setDragActive(false)}
            onDrop={(e) => {
              e.preventDefault();
              setDragActive(false);
              selectFile(e.dataTransfer.files?.[0] ?? null);
            }}
            className="block w-full cursor-pointer rounded-xl border-2 border-dashed border-gray-300 hover:border-blue-400 p-4 text-sm text-gray-700 hover:bg-gray-50 transition relative z-0"
            title="Click or drop a PDF here to upload"
          >
            <div className="font-medium">Click to choose a PDF or drop it here</div>
            <div className="text-xs text-gray-500 mt-0.5">
              A new upload replaces the current document.
            </div>
          </label>

          {file && (
            <div className="mt-3 flex flex-col sm:flex-row sm:items-center sm:justify-between gap-2">
              <p className="text-sm text-gray-700 min-w-0 truncate">
                <span className="font-medium">Selected:</span> {file.name}
              </p>
              <button
                onClick={uploadFile}
                disabled={loadingUpload}
                className="rounded-xl border px-3 py-1 text-sm hover:bg-gray-50 disabled:opacity-60"
              >
                {loadingUpload ? "Processing..." : "Process"}
              </button>
            </div>
          )}

          <div className="text-xs text-gray-500 text-right mt-3">
            {doc ? (
              <div className="flex items-center justify-end gap-3">
                <div className="min-w-0">
                  <div className="font-medium">Loaded PDF</div>
                  <div className="mt-0.5 truncate max-w-[40vw]">
                    {doc.fileName} ({doc.chunkCount} chunks)
                  </div>
                </div>
                <button
                  onClick={removeDocument}
                  disabled={deleteLoading}
                  className="text-red-500 hover:underline whitespace-nowrap disabled:opacity-60"
                >
                  {deleteLoading ? "Removing..." : "Remove"}
                </button>
              </div>
            ) : (
              <div>No PDF loaded</div>
            )}
          </div>
        </section>

        <section className="rounded-2xl border bg-white p-4 space-y-3">
          <h2 className="font-semibold">2) Ask a question about the PDF</h2>

          <div className="mt-4 space-y-3">
            {messages.map((m, i) => (
              <div
                key={i}
                className={m.role === "user" ? "text-right" : "text-left"}
              >
                <div
                  className={`inline-block rounded-2xl px-3 py-2 whitespace-pre-line break-words max-w-full ${
                    m.role === "user"
                      ? "bg-blue-50 text-right"
                      : "bg-gray-100 text-left"
                  }`}
                >
                  <strong>{m.role === "user" ? "You" : "AI"}:</strong>{" "}
                  <span className="ml-1">{m.text}</span>
                </div>
                {m.sources && m.sources.length > 0 && (
                  <details className="mt-1 text-xs text-gray-600">
                    <summary className="cursor-pointer">
                      Sources ({m.sources.length})
                    </summary>
                    <ul className="mt-1 space-y-1">
                      {m.sources.map((s) => (
                        <li key={s.chunkIndex}>
                          <span className="font-medium">
                            Chunk {s.chunkIndex} · {s.score.toFixed(3)}
                          </span>{" "}
                          {snippet(s.text)}
                        </li>
                      ))}
                    </ul>
                  </details>
                )}
              </div>
            ))}

            {loadingAsk && (
              <div className="text-left mt-2">
                <span className="inline-block rounded-2xl px-3 py-2 bg-gray-100">
                  <strong>AI:</strong> <span className="italic">Thinking</span>{" "}
                  <span className="ml-2">
                    <Dots />
                  </span>
                </span>
              </div>
            )}
          </div>

          <div className="flex flex-col sm:flex-row sm:items-center gap-2">
            <input
              value={question}
              onChange={(e) => setQuestion(e.target.value)}
              onKeyDown={(e) => {
                if (e.key === "Enter" && !e.shiftKey) {
                  e.preventDefault();
                  if (!askDisabled) void ask();
                }
              }}
              placeholder="e.g., What are the main requirements?"
              className="flex-1 min-w-0 rounded-xl border px-3 py-2"
              aria-label="Ask a question about the PDF"
            />
            <button
              onClick={ask}
              disabled={askDisabled}
              className={`w-full sm:w-auto rounded-xl px-4 py-2 transition transform duration-150 ${
                askDisabled
                  ? "bg-gray-200 text-gray-600 border disabled:opacity-60 cursor-not-allowed"
                  : "bg-blue-600 text-white hover:bg-blue-700 hover:shadow-md hover:-translate-y-0.5"
              }`}
            >
              {loadingAsk ? "Thinking..." : "Ask"}
            </button>
          </div>
        </section>
      </div>
    </main>
  );
}

// small animated dots for the thinking indicator
function Dots() {
  return (
    <span className="inline-flex items-center gap-1">
      <span
        className="w-1 h-1 rounded-full bg-gray-500 animate-bounce"
        style={{ animationDelay: "0ms" }}
      />
      <span
        className="w-1 h-1 rounded-full bg-gray-500 animate-bounce"
        style={{ animationDelay: "150ms" }}
      />
      <span
        className="w-1 h-1 rounded-full bg-gray-500 animate-bounce"
        style={{ animationDelay: "300ms" }}
      />
    </span>
  );
}
