import SunCalc from "suncalc";
import type { SunGuardConfig } from "../../shared/config/roof-monitor";

export type SunGuardReading = {
  altitudeDegrees: number;
  thresholdDegrees: number;
  safeForOpen: boolean;
};

const RADIANS_TO_DEGREES = 180 / Math.PI;

/**
 * Reports whether the sun is low enough for an OPEN roof reading to be
 * trusted. Daylight frames are easily misread as an open sky.
 */
export class SunGuard {
  private readonly config: SunGuardConfig;

  constructor(config: SunGuardConfig) {
    this.config = { ...config };
  }

  altitudeAt(at: Date): number {
    const position = SunCalc.getPosition(
      at,
      this.config.latitude,
      this.config.longitude,
    );
    return position.altitude * RADIANS_TO_DEGREES;
  }

  evaluate(at: Date): SunGuardReading {
    const altitudeDegrees = this.altitudeAt(at);
    return {
      altitudeDegrees,
      thresholdDegrees: this.config.altitudeThresholdDegrees,
      safeForOpen: altitudeDegrees < this.config.altitudeThresholdDegrees,
    };
  }
}
