import type {
  ClockPort,
  DangerLevel,
  RandomSourcePort,
  TelemetrySnapshot,
} from '@rover/domain';

/** Base position the simulated rover drifts around. */
export const BASE_COORDINATE = { lat: 46.0569, lon: 14.5058 } as const;

export interface TelemetrySynthesizerOptions {
  clock: ClockPort;
  random: RandomSourcePort;
  imageUrl: string;
}

export function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Folds an angle that rounded up to 360 back to 0. */
export function wrapAngle(deg: number): number {
  return deg >= 360 ? deg - 360 : deg;
}

/**
 * Smooth periodic drift plus bounded jitter:
 * `base + amplitude * sin(elapsedSec * speed) + uniform(-noise, noise)`.
 */
export function simValue(
  elapsedSec: number,
  random: RandomSourcePort,
  base: number,
  amplitude: number,
  speed: number,
  noise = 0.5,
): number {
  const jitter = -noise + random.next() * 2 * noise;
  return base + amplitude * Math.sin(elapsedSec * speed) + jitter;
}

/** Maps 10°C..60°C surface temperature onto hue 220 (blue) .. 0 (red). */
export function camouflageHue(surfaceTempC: number): number {
  return clamp(Math.round(220 - (surfaceTempC - 10) * (220 / 50)), 0, 220);
}

export function camouflageColor(surfaceTempC: number): string {
  return `hsl(${camouflageHue(surfaceTempC)}, 70%, 55%)`;
}

export function dangerLevelFor(uvIndex: number, surfaceTempC: number): DangerLevel {
  if (uvIndex > 7 || surfaceTempC > 50) return 'high';
  if (uvIndex > 5 || surfaceTempC > 40) return 'medium';
  return 'low';
}

/**
 * Produces rover telemetry as a function of time. Elapsed time is measured
 * from construction, so the sine drift restarts with the process.
 */
export class TelemetrySynthesizer {
  private readonly clock: ClockPort;
  private readonly random: RandomSourcePort;
  private readonly imageUrl: string;
  private readonly startedAtMs: number;

  constructor(options: TelemetrySynthesizerOptions) {
    this.clock = options.clock;
    this.random = options.random;
    this.imageUrl = options.imageUrl;
    this.startedAtMs = options.clock.now().getTime();
  }

  synthesize(now: Date = this.clock.now()): TelemetrySnapshot {
    const elapsedSec = (now.getTime() - this.startedAtMs) / 1000;
    const unixSec = now.getTime() / 1000;
    const sim = (base: number, amplitude: number, speed: number, noise?: number) =>
      simValue(elapsedSec, this.random, base, amplitude, speed, noise);

    // Environment
    const ambientTemp = round(sim(22, 6, 0.06), 2);
    const surfaceTemp = round(ambientTemp + sim(5, 3, 0.08, 0.3), 2);
    const uvIndex = Math.max(0, round(sim(4, 3, 0.05, 0.4), 2));
    const irRadiation = Math.max(0, round(sim(250, 120, 0.03, 5), 2));
    const lightLux = Math.max(0, round(sim(20_000, 15_000, 0.04, 500), 2));

    // Power
    const batteryPct = clamp(round(sim(78, 8, 0.01, 1), 1), 0, 100);
    const batteryVoltage = round(3 + (batteryPct / 100) * 1.2, 2);

    // Attitude
    const pitch = round(sim(2, 10, 0.02, 0.8), 2);
    const roll = round(sim(1, 12, 0.018, 0.8), 2);
    const yaw = wrapAngle(round((unixSec * 12) % 360, 2));

    // Navigation
    const lat = round(BASE_COORDINATE.lat + sim(0, 0.0008, 0.002, 0.0001), 6);
    const lon = round(BASE_COORDINATE.lon + sim(0, 0.0008, 0.002, 0.0001), 6);
    const speed = round(Math.max(0, sim(0.8, 0.6, 0.07, 0.2)), 2);

    // Solar tracking
    const sunDir = (unixSec * 6) % 360;
    const targetAzimuth = wrapAngle(round(sunDir, 2));
    const panelAzimuth = round(sunDir + sim(0, 5, 0.2, 1.5), 2);

    return {
      timestamp: now.toISOString(),
      environment: {
        ambient_temp_c: ambientTemp,
        surface_temp_c: surfaceTemp,
        uv_index: uvIndex,
        ir_mw_m2: irRadiation,
        light_lux: lightLux,
      },
      power: {
        battery_pct: batteryPct,
        battery_voltage: batteryVoltage,
      },
      attitude: { pitch, roll, yaw },
      navigation: {
        lat,
        lon,
        speed_mps: speed,
        heading: yaw,
      },
      solar: {
        target_azimuth: targetAzimuth,
        panel_azimuth: panelAzimuth,
        light_lux: lightLux,
      },
      camouflage: {
        color_hsl: camouflageColor(surfaceTemp),
      },
      danger_level: dangerLevelFor(uvIndex, surfaceTemp),
      image: { url: this.imageUrl },
    };
  }
}
