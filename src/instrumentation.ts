// src/instrumentation.ts

// Builds the pipeline at server start so a bad configuration or an
// unreachable index stops the process instead of failing the first request.
export async function register() {
  if (process.env.NEXT_RUNTIME === "nodejs") {
    const { getContainer } = await import("./lib/container");
    await getContainer();
  }
}
