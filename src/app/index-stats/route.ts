// src/app/index-stats/route.ts
import { handlers } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const GET = handlers.indexStats;
