export type DangerLevel = 'low' | 'medium' | 'high';

export const DANGER_LEVELS: readonly DangerLevel[] = ['low', 'medium', 'high'];

export interface EnvironmentReading {
  readonly ambient_temp_c: number;
  readonly surface_temp_c: number;
  readonly uv_index: number;
  readonly ir_mw_m2: number;
  readonly light_lux: number;
}

export interface PowerReading {
  readonly battery_pct: number;
  readonly battery_voltage: number;
}

export interface AttitudeReading {
  readonly pitch: number;
  readonly roll: number;
  readonly yaw: number;
}

export interface NavigationReading {
  readonly lat: number;
  readonly lon: number;
  readonly speed_mps: number;
  readonly heading: number;
}

export interface SolarReading {
  readonly target_azimuth: number;
  readonly panel_azimuth: number;
  readonly light_lux: number;
}

export interface CamouflageReading {
  readonly color_hsl: string;
}

export interface CameraFrame {
  readonly url: string;
}

/**
 * One synthesized rover reading. Property names are the wire format, which is
 * also the shape persisted to the store.
 */
export interface TelemetrySnapshot {
  readonly timestamp: string;
  readonly environment: EnvironmentReading;
  readonly power: PowerReading;
  readonly attitude: AttitudeReading;
  readonly navigation: NavigationReading;
  readonly solar: SolarReading;
  readonly camouflage: CamouflageReading;
  readonly danger_level: DangerLevel;
  readonly image?: CameraFrame;
}
