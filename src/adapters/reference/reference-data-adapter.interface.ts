import { SettingsMap } from '../../config/decision.config';
import { ReferenceData } from '../../types/domain.types';
import { Result } from '../../types/result.types';

/**
 * Adapter for the static reference tables: routes, vessel classes,
 * carbon parameters and the param/value settings sheet.
 */
export interface IReferenceDataAdapter {
  /**
   * @returns Result with success=true and data once all three tables load, success=false on read or validation error
   */
  getReferenceData(): Promise<Result<ReferenceData>>;

  getSettings(): Promise<Result<SettingsMap>>;
}
