/**
 * Tests for the reconnection backoff.
 *
 * @module
 */
import { type BackoffOptions, backoffDelay } from "@chainstream/client/client"
import { describe, expect, it } from "@effect/vitest"
import * as Duration from "effect/Duration"

const options: BackoffOptions = {
  base: Duration.millis(500),
  max: Duration.seconds(30),
  jitter: false
}

const delay = (retry: number, sample?: number, jitter = false): number =>
  Duration.toMillis(backoffDelay({ ...options, jitter }, retry, sample))

describe("backoffDelay", () => {
  it("doubles the delay with every retry", () => {
    expect([0, 1, 2, 3, 4, 5].map((retry) => delay(retry))).toEqual([500, 1000, 2000, 4000, 8000, 16000])
  })

  it("caps the delay at the maximum", () => {
    expect(delay(6)).toBe(30_000)
    expect(delay(1_000)).toBe(30_000)
  })

  it("scales the delay by the jitter sample", () => {
    expect(delay(2, 0, true)).toBe(1000)
    expect(delay(2, 0.5, true)).toBe(1500)
    expect(delay(10, 0, true)).toBe(15_000)
  })

  it("ignores the sample without jitter", () => {
    expect(delay(2, 0)).toBe(2000)
  })
})
