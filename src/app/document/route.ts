// src/app/document/route.ts
import { handlers } from "@/lib/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export const DELETE = handlers.removeDocument;
