// src/app/route.ts
import { liveness } from "@/lib/http";

export const dynamic = "force-dynamic";

export function GET() {
  return liveness();
}
