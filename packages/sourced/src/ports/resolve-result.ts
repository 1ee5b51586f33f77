import type { ResolutionFailure } from "../core/errors"

export type ResolvedValue<T> = {
  readonly success: true
  readonly value: T
}

export type FailedResolution<E = ResolutionFailure> = {
  readonly success: false
  readonly error: E
}

export type ResolveResult<T, E = ResolutionFailure> = ResolvedValue<T> | FailedResolution<E>
