import type { Detector, DetectorContext, Violation } from "../types";
import { NullSafety, CollectionSafety, ExternalCallSafety, TypeSafety } from "./detectors-01-04";
import { BoundsSafety, ExceptionHandling, ConcurrencySafety } from "./detectors-05-07";

export const ALL_DETECTORS: Detector[] = [
  NullSafety,
  CollectionSafety,
  ExternalCallSafety,
  TypeSafety,
  BoundsSafety,
  ExceptionHandling,
  ConcurrencySafety,
];

/** Run every detector over one tree. Detectors share no state. */
export function runDetectors(ctx: DetectorContext, detectors: Detector[] = ALL_DETECTORS): Violation[] {
  return detectors.flatMap((d) => d.detect(ctx));
}

export {
  NullSafety,
  CollectionSafety,
  ExternalCallSafety,
  TypeSafety,
  BoundsSafety,
  ExceptionHandling,
  ConcurrencySafety,
};
