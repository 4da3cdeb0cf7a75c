import { buildBatchReport } from "@/src/lib/explain/report";
import { batchOptimize } from "@/src/lib/expiry/batch";
import { ExpirationOptimizer } from "@/src/lib/expiry/optimizer";
import { BatchRequestSchema, describeIssues } from "@/src/lib/expiry/schema";
import type { ExpirationCandidate } from "@/src/lib/types";

const optimizer = new ExpirationOptimizer();

export async function POST(request: Request) {
  try {
    const parsed = BatchRequestSchema.safeParse(await request.json());
    if (!parsed.success) {
      return Response.json(
        { success: false, error: describeIssues(parsed.error), code: "INVALID_REQUEST" },
        { status: 400 }
      );
    }

    const { candidatesBySymbol, volatilities, strategy, weights } = parsed.data;
    const results = batchOptimize(optimizer, candidatesBySymbol, volatilities, { strategy, weights });

    const winners: Record<string, ExpirationCandidate> = {};
    Object.entries(results).forEach(([symbol, entry]) => {
      if (entry.success) winners[symbol] = entry.winner;
    });

    return Response.json({ success: true, results, report: buildBatchReport(winners) });
  } catch (error) {
    return Response.json(
      {
        success: false,
        error: error instanceof Error ? error.message : "Invalid request",
        code: "INVALID_REQUEST"
      },
      { status: 400 }
    );
  }
}
