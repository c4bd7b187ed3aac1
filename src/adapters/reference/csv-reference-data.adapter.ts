import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { AppConfig } from '../../config/app.config';
import { SettingsMap } from '../../config/decision.config';
import { CarbonParams, ReferenceData, Route, Vessel } from '../../types/domain.types';
import { Result } from '../../types/result.types';
import { IReferenceDataAdapter } from './reference-data-adapter.interface';

// Zod schemas for validating CSV rows (snake_case headers as stored on disk)
const RouteRowSchema = z.object({
  load_port: z.string().min(1, 'Load port cannot be empty'),
  discharge_port: z.string().min(1, 'Discharge port cannot be empty'),
  distance_nm: z.number().nonnegative('Distance must be >= 0')
});

const VesselRowSchema = z.object({
  vessel_class: z.string().min(1, 'Vessel class cannot be empty'),
  cargo_capacity_m3: z.number().positive(),
  laden_speed_kn: z.number().positive('Laden speed must be > 0'),
  ballast_speed_kn: z.number().positive('Ballast speed must be > 0'),
  boil_off_pct_per_day: z.number().min(0).lt(100, 'Boil-off must be below 100%/day'),
  fuel_consumption_tpd_laden: z.number().nonnegative(),
  fuel_consumption_tpd_ballast: z.number().nonnegative()
});

const ParamRowSchema = z.object({
  param: z.string().min(1, 'Parameter name cannot be empty'),
  value: z.number()
});

const CarbonParamsSchema = z.object({
  EUA_price_USD_per_t: z.number().nonnegative(),
  CO2_factor_VLSFO_tCO2_per_t_fuel: z.number().nonnegative(),
  CO2_factor_LNG_tCO2_per_t_fuel: z.number().nonnegative()
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
}

@injectable()
export class CsvReferenceDataAdapter implements IReferenceDataAdapter {
  private referenceCache: ReferenceData | null = null;
  private settingsCache: SettingsMap | null = null;

  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  async getReferenceData(): Promise<Result<ReferenceData>> {
    if (this.referenceCache !== null) {
      return { success: true, data: this.referenceCache, message: 'Reference data served from cache' };
    }

    try {
      const routes = this.mapRoutes(await this.readRows(this.config.data.routesPath));
      const vessels = this.mapVessels(await this.readRows(this.config.data.vesselsPath));
      const carbonParams = this.mapCarbonParams(
        this.toParamMap(await this.readRows(this.config.data.carbonParamsPath), 'carbon_params')
      );

      this.referenceCache = { routes, vessels, carbonParams };
      return {
        success: true,
        data: this.referenceCache,
        message: `Reference data loaded: ${routes.length} route(s), ${vessels.length} vessel class(es)`
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        message: `Failed to load reference data: ${errorMessage}`
      };
    }
  }

  async getSettings(): Promise<Result<SettingsMap>> {
    if (this.settingsCache !== null) {
      return { success: true, data: this.settingsCache, message: 'Settings served from cache' };
    }

    try {
      this.settingsCache = this.toParamMap(await this.readRows(this.config.data.settingsPath), 'config');
      return {
        success: true,
        data: this.settingsCache,
        message: `Settings loaded: ${Object.keys(this.settingsCache).length} parameter(s)`
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        message: `Failed to load settings: ${errorMessage}`
      };
    }
  }

  private async readRows(filePath: string): Promise<unknown[]> {
    const content = await readFile(filePath, 'utf-8');
    const rows: unknown[] = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      cast: true
    });
    return rows;
  }

  private mapRoutes(rows: unknown[]): Route[] {
    const routes = new Map<string, Route>();

    for (const row of rows) {
      const validationResult = RouteRowSchema.safeParse(row);
      if (!validationResult.success) {
        console.warn(`[Reference Data] Skipping invalid route row: ${describeIssues(validationResult.error)}`);
        continue;
      }

      const r = validationResult.data;
      const key = `${r.load_port}->${r.discharge_port}`;
      if (routes.has(key)) {
        console.warn(`[Reference Data] Duplicate route ${key} ignored, keeping first row`);
        continue;
      }
      routes.set(key, { loadPort: r.load_port, dischargePort: r.discharge_port, distanceNm: r.distance_nm });
    }

    return [...routes.values()];
  }

  private mapVessels(rows: unknown[]): Vessel[] {
    const vessels = new Map<string, Vessel>();

    for (const row of rows) {
      const validationResult = VesselRowSchema.safeParse(row);
      if (!validationResult.success) {
        console.warn(`[Reference Data] Skipping invalid vessel row: ${describeIssues(validationResult.error)}`);
        continue;
      }

      const v = validationResult.data;
      if (vessels.has(v.vessel_class)) {
        console.warn(`[Reference Data] Duplicate vessel class ${v.vessel_class} ignored, keeping first row`);
        continue;
      }
      vessels.set(v.vessel_class, {
        vesselClass: v.vessel_class,
        cargoCapacityM3: v.cargo_capacity_m3,
        ladenSpeedKn: v.laden_speed_kn,
        ballastSpeedKn: v.ballast_speed_kn,
        boilOffPctPerDay: v.boil_off_pct_per_day,
        fuelConsumptionTpdLaden: v.fuel_consumption_tpd_laden,
        fuelConsumptionTpdBallast: v.fuel_consumption_tpd_ballast
      });
    }

    return [...vessels.values()];
  }

  private toParamMap(rows: unknown[], sheet: string): SettingsMap {
    const params: SettingsMap = {};

    for (const row of rows) {
      const validationResult = ParamRowSchema.safeParse(row);
      if (!validationResult.success) {
        console.warn(`[Reference Data] Skipping invalid ${sheet} row: ${describeIssues(validationResult.error)}`);
        continue;
      }
      params[validationResult.data.param] = validationResult.data.value;
    }

    return params;
  }

  private mapCarbonParams(params: SettingsMap): CarbonParams {
    const validationResult = CarbonParamsSchema.safeParse(params);
    if (!validationResult.success) {
      throw new Error(`carbon_params validation failed: ${describeIssues(validationResult.error)}`);
    }

    const validated = validationResult.data;
    return {
      euaPriceUsdPerT: validated.EUA_price_USD_per_t,
      co2FactorVlsfoTco2PerTFuel: validated.CO2_factor_VLSFO_tCO2_per_t_fuel,
      co2FactorLngTco2PerTFuel: validated.CO2_factor_LNG_tCO2_per_t_fuel
    };
  }
}
