import { GrblResponse, ResponseType } from "@grbl-node/types";
import settingTable from "./grbl-settings.json";

export interface SettingInfo {
  name: string;
  unit: string;
}

const SETTING_INFO: ReadonlyMap<number, SettingInfo> = new Map(
  Object.entries(settingTable).map(([setting, info]) => [Number(setting), info])
);

/** Name and unit of a GRBL 1.1 setting, or null for unknown numbers. */
export function describeSetting(setting: number): SettingInfo | null {
  return SETTING_INFO.get(setting) ?? null;
}

/**
 * Controller settings as last reported by `$$`.
 *
 * @example
 * ```typescript
 * const settings = new GrblSettings();
 * settings.apply(parseResponse("$110=5000.000"));
 * settings.getNumber(110); // 5000
 * settings.describe(110);  // { name: "X-axis maximum rate", unit: "mm/min" }
 * ```
 */
export class GrblSettings {
  private values: Map<number, string> = new Map();

  /**
   * Records a SETTING response. Other responses are ignored.
   * @returns Whether the response was a setting
   */
  apply(response: GrblResponse | null): boolean {
    if (response?.type !== ResponseType.SETTING) return false;
    this.values.set(response.setting, response.value);
    return true;
  }

  get(setting: number): string | null {
    return this.values.get(setting) ?? null;
  }

  /** Numeric value of a setting, or null when unknown or not a number */
  getNumber(setting: number): number | null {
    const value = this.get(setting);
    if (value === null || value === "") return null;
    const number = Number(value);
    return Number.isFinite(number) ? number : null;
  }

  /** Every reported setting, ordered by number */
  entries(): Array<[number, string]> {
    return [...this.values.entries()].sort(([a], [b]) => a - b);
  }

  describe(setting: number): SettingInfo | null {
    return describeSetting(setting);
  }

  get size(): number {
    return this.values.size;
  }

  clear(): void {
    this.values.clear();
  }
}
