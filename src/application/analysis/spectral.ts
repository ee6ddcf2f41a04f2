import type {
  DominantFrequency,
  FrequencyMetrics,
  PeriodPattern,
  SignalQualityLevel,
  SubAnalysis,
} from "../../core/entities/features";
import { insufficientData } from "../../core/entities/appError";
import { err, ok } from "neverthrow";
import { mean, sampleStd, sum } from "./statistics";

const TOP_FREQUENCIES = 5;

/**
 * Power spectrum |X_k|^2 of a real sequence via a direct DFT; series here are a few hundred points at most.
 */
export const powerSpectrum = (values: number[]): number[] => {
  const n = values.length;
  return values.map((_, k) => {
    let real = 0;
    let imaginary = 0;
    values.forEach((value, t) => {
      const angle = (-2 * Math.PI * k * t) / n;
      real += value * Math.cos(angle);
      imaginary += value * Math.sin(angle);
    });
    return real * real + imaginary * imaginary;
  });
};

/**
 * Sample frequencies in cycles per observation, laid out like the DFT bins.
 */
export const binFrequencies = (n: number): number[] =>
  Array.from({ length: n }, (_, k) => (k < Math.ceil(n / 2) ? k : k - n) / n);

export const classifyPeriod = (period: number): PeriodPattern => {
  if (period >= 11 && period <= 13) return "annual";
  if (period >= 5 && period <= 7) return "semi-annual";
  if (period >= 2.5 && period <= 4) return "quarterly";
  if (period >= 1 && period <= 2) return "monthly";
  return "unknown";
};

export const classifySignalQuality = (snr: number): SignalQualityLevel => {
  if (snr > 10) return "excellent";
  if (snr > 5) return "good";
  if (snr > 2) return "fair";
  return "poor";
};

/**
 * Dominant cycles of a standardized series and a low-vs-high frequency signal-to-noise ratio.
 */
export const analyzeFrequencies = (
  values: number[],
  minPoints: number,
): SubAnalysis<FrequencyMetrics> => {
  if (values.length < minPoints) {
    return err(insufficientData("Fourier analysis", minPoints, values.length));
  }

  const center = mean(values);
  const scale = sampleStd(values);
  if (!(scale > 0)) {
    return err({
      code: "computation_failed",
      message: "Fourier analysis needs a series with non-zero variance.",
    });
  }

  const normalized = values.map((value) => (value - center) / scale);
  const spectrum = powerSpectrum(normalized);
  const frequencies = binFrequencies(values.length);

  const positive = frequencies
    .map((frequency, index) => ({ frequency, power: spectrum[index] ?? 0 }))
    .filter((bin) => bin.frequency > 0);
  const maxPower = Math.max(...positive.map((bin) => bin.power));

  const dominantFrequencies: DominantFrequency[] = [...positive]
    .sort((a, b) => b.power - a.power)
    .slice(0, TOP_FREQUENCIES)
    .map((bin) => ({ ...bin, period: 1 / bin.frequency }))
    .filter((bin) => bin.period > 0 && bin.period <= values.length / 2)
    .map((bin) => ({
      frequency: bin.frequency,
      period: bin.period,
      power: bin.power,
      pattern: classifyPeriod(bin.period),
      relativeStrength: maxPower > 0 ? bin.power / maxPower : 0,
    }));

  const totalPower = sum(spectrum);
  const signalPower = sum(
    positive.slice(0, Math.floor(positive.length / 2)).map((bin) => bin.power),
  );
  const noisePower = totalPower - signalPower;
  const signalToNoise =
    noisePower > 0 ? signalPower / noisePower : Number.POSITIVE_INFINITY;

  return ok({
    dominantFrequencies,
    totalPower,
    signalPower,
    noisePower,
    signalToNoise,
    quality: classifySignalQuality(signalToNoise),
    pointsAnalyzed: values.length,
  });
};
