import { isOptimizationError, toFailureDetail } from "@/src/lib/errors";
import { buildRecommendation, improvementVsAverage } from "@/src/lib/explain/report";
import { ExpirationOptimizer } from "@/src/lib/expiry/optimizer";
import { describeIssues, OptimizeRequestSchema } from "@/src/lib/expiry/schema";

const TOP_CANDIDATES = 3;

const optimizer = new ExpirationOptimizer();

export async function POST(request: Request) {
  let payload: unknown;
  try {
    payload = await request.json();
  } catch {
    return Response.json(
      { success: false, error: "Request body must be valid JSON.", code: "INVALID_REQUEST" },
      { status: 400 }
    );
  }

  const parsed = OptimizeRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return Response.json(
      { success: false, error: describeIssues(parsed.error), code: "INVALID_REQUEST" },
      { status: 400 }
    );
  }

  const body = parsed.data;
  const now = new Date();
  try {
    const result = optimizer.findOptimal(body.candidates, {
      symbol: body.symbol,
      volatility: body.volatility,
      strategy: body.strategy,
      weights: body.weights,
      includeProcess: body.includeProcess,
      now
    });

    return Response.json({
      success: true,
      symbol: body.symbol?.toUpperCase() ?? null,
      strategy: body.strategy,
      optimal: result.winner,
      topCandidates: result.candidates.slice(0, TOP_CANDIDATES),
      analysis: {
        totalCandidates: result.candidates.length,
        droppedCandidates: result.dropped,
        improvementVsAverage: improvementVsAverage(result.candidates),
        weightsUsed: result.weights
      },
      recommendation: buildRecommendation(result.winner, body.strategy),
      process: result.process,
      timestamp: now.toISOString()
    });
  } catch (error) {
    const detail = toFailureDetail(error);
    return Response.json(
      { success: false, error: detail.message, code: detail.code },
      { status: isOptimizationError(error) ? 422 : 500 }
    );
  }
}
