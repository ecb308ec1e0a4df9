import { describe, it, expect } from "vitest";
import { type LoadedDocument, SessionRegistry } from "../sessions";

function doc(documentId: string): LoadedDocument {
  return {
    documentId,
    fileName: `${documentId}.pdf`,
    chunks: [{ index: 0, text: "only chunk", tokenCount: 2 }],
    uploadedAt: 0,
  };
}

describe("SessionRegistry", () => {
  it("starts sessions empty", () => {
    const sessions = new SessionRegistry();
    expect(sessions.get("s1")).toBeNull();
    const s = sessions.getOrCreate("s1");
    expect(s.state).toBe("EMPTY");
    expect(s.document).toBeNull();
    expect(sessions.size()).toBe(1);
  });

  it("moves through PROCESSING to READY", () => {
    const sessions = new SessionRegistry();
    const generation = sessions.markProcessing("s1");
    expect(sessions.get("s1")?.state).toBe("PROCESSING");
    expect(sessions.isCurrent("s1", generation)).toBe(true);

    sessions.markReady("s1", doc("d1"));
    expect(sessions.get("s1")?.state).toBe("READY");
    expect(sessions.get("s1")?.document?.documentId).toBe("d1");
  });

  it("invalidates an earlier upload when a newer one starts", () => {
    const sessions = new SessionRegistry();
    const first = sessions.markProcessing("s1");
    const second = sessions.markProcessing("s1");
    expect(sessions.isCurrent("s1", first)).toBe(false);
    expect(sessions.isCurrent("s1", second)).toBe(true);
  });

  it("reports a failure once and then returns to EMPTY", () => {
    const sessions = new SessionRegistry();
    sessions.markReady("s1", doc("d1"));
    sessions.markProcessing("s1");
    sessions.markFailed("s1", "Could not read PDF");

    expect(sessions.get("s1")?.state).toBe("ERROR");
    expect(sessions.get("s1")?.document).toBeNull();
    expect(sessions.takeError("s1")).toBe("Could not read PDF");
    expect(sessions.get("s1")?.state).toBe("EMPTY");
    expect(sessions.takeError("s1")).toBeNull();
  });

  it("clears the loaded document", () => {
    const sessions = new SessionRegistry();
    sessions.markReady("s1", doc("d1"));
    expect(sessions.clear("s1")?.documentId).toBe("d1");
    expect(sessions.get("s1")?.state).toBe("EMPTY");
    expect(sessions.clear("missing")).toBeNull();
  });

  it("prunes idle sessions but never one that is processing", () => {
    let now = 0;
    const sessions = new SessionRegistry(() => now);
    sessions.markReady("idle", doc("d1"));
    sessions.markProcessing("busy");
    now = 10_000;
    sessions.markReady("fresh", doc("d2"));

    const expired = sessions.prune(5_000);
    expect(expired.map((s) => s.id)).toEqual(["idle"]);
    expect(sessions.size()).toBe(2);
    expect(sessions.get("idle")).toBeNull();
  });
});
