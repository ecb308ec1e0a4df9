// src/app/ask-question/route.ts
import { handlers } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const POST = handlers.ask;
