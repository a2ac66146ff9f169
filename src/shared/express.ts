/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * requestTimer stores the arrival time on the request; controllers read it
 * to compute meta.totalTimeMs. Both import this module for its side effect,
 * so the augmentation is part of every program that touches the field.
 */
declare global {
  namespace Express {
    interface Request {
      /** Set by requestTimer middleware; used to compute totalTimeMs in responses. */
      requestStartTime?: number;
    }
  }
}

export {};
