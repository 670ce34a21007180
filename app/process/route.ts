import { handleProcessRequest } from "@/lib/http";
import { getPipeline } from "@/lib/runtime";

export const runtime = "nodejs";

export async function POST(request: Request) {
  return handleProcessRequest(getPipeline(), request);
}
