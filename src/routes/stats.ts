import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";

export function registerStatsRoutes(app: Express, ctx: AppContext): void {
  const { logger, sightingRepo, vehicleRepo, contributorRepo } = ctx;

  /**
   * GET /api/stats
   *
   * Totals for dashboards; no per-contributor data.
   */
  app.get("/api/stats", (_req: Request, res: Response) => {
    try {
      res.json({
        ok: true,
        sightings: sightingRepo.totalCount(),
        uniquePlatesSighted: sightingRepo.uniqueSightedCount(),
        uniquePlatesPosted: sightingRepo.uniquePostedCount(),
        registryVehicles: vehicleRepo.count(),
        contributors: contributorRepo.count(),
      });
    } catch (err) {
      logger.error({ err }, "stats.query_failed");
      res.status(500).json({ ok: false, error: "INTERNAL_ERROR" });
    }
  });

  /**
   * GET /api/stats/plates/:plate
   */
  app.get("/api/stats/plates/:plate", (req: Request, res: Response) => {
    const plate = req.params.plate.trim().toUpperCase();
    try {
      const vehicle = vehicleRepo.findByPlate(plate);
      if (!vehicle) {
        return res.status(404).json({ ok: false, error: "PLATE_NOT_FOUND" });
      }
      return res.json({
        ok: true,
        plate,
        sightings: sightingRepo.countForPlate(plate),
        posted: sightingRepo.postedCountForPlate(plate),
        vehicle: {
          vehicleYear: vehicle.vehicleYear,
          baseName: vehicle.baseName,
          baseType: vehicle.baseType,
          active: vehicle.active,
        },
      });
    } catch (err) {
      logger.error({ err, plate }, "stats.plate_query_failed");
      return res.status(500).json({ ok: false, error: "INTERNAL_ERROR" });
    }
  });
}
