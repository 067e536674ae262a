
/**
 * Unified configuration for the screening pipeline.
 * Clinical thresholds below are provisional heuristics, not calibrated against outcome data.
 */
export const SCREENING_CONFIG = {
  // Regions of interest, as fractions of the rotated frame
  ROI_PRESETS: {
    LOWER_EYELID: { left: 0.15, top: 0.55, right: 0.85, bottom: 0.85 },
    FULL_EYE: { left: 0.1, top: 0.2, right: 0.9, bottom: 0.9 },
    CENTER: { left: 0.3, top: 0.3, right: 0.7, bottom: 0.7 }
  },

  INFERENCE: {
    INPUT_SIZE: 224,             // Square model input
    IMAGE_MEAN: 127.5,           // (c - mean) / std -> [-1, 1]
    IMAGE_STD: 127.5,
    HEURISTIC_CONFIDENCE: 0.65
  },

  PALLOR: {
    EPSILON: 0.001,
    HEALTHY_RED_RATIO: 0.50,
    HEALTHY_SATURATION: 0.30,
    RED_WEIGHT: 0.6,
    SATURATION_WEIGHT: 0.4
  },

  HEURISTIC: {
    LOW_SATURATION: 0.20,
    LOW_SATURATION_PENALTY: 0.15,
    LOW_RED_RATIO: 0.35,
    LOW_RED_RATIO_PENALTY: 0.10,
    PALE_BRIGHTNESS: 0.7,        // Bright and washed out
    PALE_SATURATION: 0.25,
    PALE_PENALTY: 0.10
  },

  VITALS: {
    HEMOGLOBIN_SEVERE: 7.0,      // g/dL
    HEMOGLOBIN_MODERATE: 10.0,
    HEMOGLOBIN_MILD: 12.0,
    HEMOGLOBIN_SEVERE_BOOST: 0.30,
    HEMOGLOBIN_MODERATE_BOOST: 0.15,
    HEMOGLOBIN_MILD_BOOST: 0.05,
    FATIGUE_HIGH: 7,
    FATIGUE_MODERATE: 5,
    FATIGUE_HIGH_BOOST: 0.10,
    FATIGUE_MODERATE_BOOST: 0.05,
    SHORTNESS_OF_BREATH_BOOST: 0.08,
    DIZZINESS_BOOST: 0.05,
    PALE_SKIN_BOOST: 0.05
  },

  CLASSIFICATION: {
    RED_THRESHOLD: 0.70,
    AMBER_THRESHOLD: 0.40
  },

  // Live preview throttling
  FRAME_THROTTLE: {
    FRAME_SKIP: 3,               // Analyze every Nth frame
    MIN_INTERVAL_MS: 500
  },

  SYNC: {
    INTERVAL_MS: 6 * 60 * 60 * 1000,
    TRANSPORT_TIMEOUT_MS: 30_000,
    DEVICE_ID_KEY: 'anonymous_device_id'
  }
} as const;

export type ScreeningConfig = typeof SCREENING_CONFIG;

export type RoiPresetName = keyof typeof SCREENING_CONFIG.ROI_PRESETS;
