import { useState, useEffect, useCallback, useRef } from 'react';
import type { DiagnosisResult, ProcessingError, Raster, RegionOfInterest } from '@/types/screening';
import type { RoiPresetName } from '@/modules/config/ScreeningConfig';
import { rasterFromRgba } from '@/modules/color-analysis/raster';
import { DEFAULT_ROI, roiPreset } from '@/modules/color-analysis/roi';
import { toProcessingError } from '@/modules/errors/ScreeningError';
import type { RiskInferenceEngine } from '@/modules/inference/RiskInferenceEngine';
import { FrameThrottle, type FrameThrottleConfig } from '@/modules/live/FrameThrottle';
import { LiveFrameAnalyzer } from '@/modules/live/LiveFrameAnalyzer';

export interface UseAnemiaScreeningOptions {
  engine: RiskInferenceEngine;
  roi?: RegionOfInterest;
  throttle?: Partial<FrameThrottleConfig>;
}

/**
 * Custom hook for live conjunctiva analysis on camera frames.
 * Frames are throttled and dropped while busy; results that arrive after
 * unmount are discarded.
 */
export const useAnemiaScreening = ({ engine, roi, throttle }: UseAnemiaScreeningOptions) => {
  const analyzerRef = useRef<LiveFrameAnalyzer | null>(null);
  const optionsRef = useRef({ roi: roi ?? DEFAULT_ROI, throttle });
  const isAnalyzingRef = useRef(false);
  const [isAnalyzing, setIsAnalyzing] = useState(false);
  const [lastResult, setLastResult] = useState<DiagnosisResult | null>(null);
  const [error, setError] = useState<ProcessingError | null>(null);
  const [framesAnalyzed, setFramesAnalyzed] = useState(0);
  const [regionOfInterest, setRegionOfInterest] = useState<RegionOfInterest>(optionsRef.current.roi);
  const [backendAvailable, setBackendAvailable] = useState(engine.isBackendAvailable());

  useEffect(() => {
    const analyzer = new LiveFrameAnalyzer({
      engine,
      throttle: new FrameThrottle(optionsRef.current.throttle),
      roi: optionsRef.current.roi,
      onResult: result => {
        setLastResult(result);
        setError(null);
        setFramesAnalyzed(prev => prev + 1);
      },
      onError: errorData => {
        console.error('useAnemiaScreening: frame error', errorData);
        setError(errorData);
      }
    });
    analyzerRef.current = analyzer;

    let active = true;
    void engine.ready().then(() => {
      if (active) setBackendAvailable(engine.isBackendAvailable());
    });

    return () => {
      active = false;
      analyzer.dispose();
      analyzerRef.current = null;
    };
  }, [engine]);

  const startAnalysis = useCallback(() => {
    console.log('useAnemiaScreening: starting live analysis');
    isAnalyzingRef.current = true;
    setIsAnalyzing(true);
    setFramesAnalyzed(0);
    setError(null);
  }, []);

  const stopAnalysis = useCallback(() => {
    console.log('useAnemiaScreening: stopping live analysis');
    isAnalyzingRef.current = false;
    setIsAnalyzing(false);
  }, []);

  /** Returns true when the frame was accepted for analysis. */
  const processFrame = useCallback((frame: Raster): boolean => {
    const analyzer = analyzerRef.current;
    if (!analyzer || !isAnalyzingRef.current) return false;
    return analyzer.submit(frame);
  }, []);

  const processImageData = useCallback(
    (imageData: { width: number; height: number; data: ArrayLike<number> }, rotationDegrees = 0): boolean => {
      if (!analyzerRef.current || !isAnalyzingRef.current) return false;
      try {
        return processFrame(rasterFromRgba(imageData, rotationDegrees));
      } catch (err) {
        setError(toProcessingError(err));
        return false;
      }
    },
    [processFrame]
  );

  const setRoi = useCallback((next: RegionOfInterest) => {
    try {
      analyzerRef.current?.setRegionOfInterest(next);
      optionsRef.current.roi = next;
      setRegionOfInterest(next);
    } catch (err) {
      setError(toProcessingError(err));
    }
  }, []);

  const setRoiPreset = useCallback((name: RoiPresetName) => setRoi(roiPreset(name)), [setRoi]);

  return {
    isAnalyzing,
    lastResult,
    error,
    framesAnalyzed,
    regionOfInterest,
    backendAvailable,
    startAnalysis,
    stopAnalysis,
    processFrame,
    processImageData,
    setRoi,
    setRoiPreset
  };
};
