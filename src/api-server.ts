import "reflect-metadata";
import express from "express";
import cors from "cors";
import { container } from "tsyringe";
import { z } from "zod";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { DEFAULT_TRADE_ROUTE } from "./config/trade-route.defaults";
import { IDiversionAnalyzer } from "./services/diversion-analyzer.interface";
import { buildBacktestReport, buildRiskReport } from "./services/report-builder";
import { FuelType, TradeRoute } from "./types/domain.types";
import { EmptyInputError, InvalidConfigError, NotFoundError } from "./types/error.types";

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// Initialize DI container (same as index.ts)
const config = loadConfig();
setupDI(config);

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const RequestSchema = z.object({
  loadPort: z.string().min(1).optional(),
  marketAPort: z.string().min(1).optional(),
  marketBPort: z.string().min(1).optional(),
  vesselClass: z.string().min(1).optional(),
  cargoCapacityM3: z.number().positive().optional(),
  fuelType: z.nativeEnum(FuelType).optional(),
  basisHaircutPct: z.number().optional(),
  opsBufferUsd: z.number().optional(),
  decisionBufferUsd: z.number().optional(),
  coveragePct: z.number().optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
});

type AnalysisRequest = z.infer<typeof RequestSchema>;

function toRoute(body: AnalysisRequest): TradeRoute {
  return {
    loadPort: body.loadPort ?? DEFAULT_TRADE_ROUTE.loadPort,
    marketA: { ...DEFAULT_TRADE_ROUTE.marketA, port: body.marketAPort ?? DEFAULT_TRADE_ROUTE.marketA.port },
    marketB: { ...DEFAULT_TRADE_ROUTE.marketB, port: body.marketBPort ?? DEFAULT_TRADE_ROUTE.marketB.port },
    vesselClass: body.vesselClass ?? DEFAULT_TRADE_ROUTE.vesselClass,
    cargoCapacityM3: body.cargoCapacityM3 ?? DEFAULT_TRADE_ROUTE.cargoCapacityM3,
    fuelType: body.fuelType ?? DEFAULT_TRADE_ROUTE.fuelType,
  };
}

function statusFor(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof InvalidConfigError || error instanceof EmptyInputError) return 400;
  return 500;
}

// POST /api/decision - Evaluate the diversion with current market data
app.post("/api/decision", async (req, res) => {
  const parsed = RequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({
      success: false,
      error: `Invalid request: ${parsed.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    });
  }

  try {
    const analyzer = container.resolve<IDiversionAnalyzer>("IDiversionAnalyzer");
    const report = await analyzer.evaluate({ route: toRoute(parsed.data), overrides: parsed.data });

    res.json({
      success: true,
      snapshot: report.snapshot,
      tradePack: report.tradePack,
      risk: buildRiskReport(report.riskPack),
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    console.error("Decision error:", error);
    res.status(statusFor(error)).json({
      success: false,
      error: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
});

// POST /api/backtest - Validate the rule over the historical series
app.post("/api/backtest", async (req, res) => {
  const parsed = RequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({
      success: false,
      error: `Invalid request: ${parsed.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`,
    });
  }

  try {
    const analyzer = container.resolve<IDiversionAnalyzer>("IDiversionAnalyzer");
    const report = await analyzer.backtest({
      route: toRoute(parsed.data),
      overrides: parsed.data,
      from: parsed.data.from,
      to: parsed.data.to,
    });

    res.json({
      success: true,
      ...buildBacktestReport(report),
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    console.error("Backtest error:", error);
    res.status(statusFor(error)).json({
      success: false,
      error: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
});

// Health check endpoint
app.get("/health", (_req, res) => {
  res.json({ status: "ok" });
});

app.listen(config.apiPort, () => {
  console.log(`API Server running on http://localhost:${config.apiPort}`);
  console.log(`Health check: http://localhost:${config.apiPort}/health`);
});
