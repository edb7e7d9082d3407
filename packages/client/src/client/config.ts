/**
 * This module contains the configuration of the streaming and historical
 * clients.
 *
 * @module
 */
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Duration from "effect/Duration"
import * as Effect from "effect/Effect"
import * as Encoding from "effect/Encoding"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import * as Redacted from "effect/Redacted"

// =============================================================================
// Options
// =============================================================================

/**
 * How the client behaves when a subscriber does not keep up with the events
 * delivered to it.
 *
 * - `"suspend"`: once the buffer of a subscription is full, the subscription
 *   is paused on the server. It resumes where it left off once the subscriber
 *   has drained half of the buffer. No event is lost.
 * - `"drop-oldest"`: the oldest buffered events are discarded to make room for
 *   new ones.
 * - `"fail"`: the subscription fails with a `BackpressureError`.
 *
 * In every case other subscriptions keep receiving events.
 */
export type BackpressurePolicy = "suspend" | "drop-oldest" | "fail"

/**
 * The exponential backoff applied between reconnection attempts.
 */
export interface BackoffOptions {
  /**
   * The delay before the first reconnection attempt.
   */
  readonly base: Duration.Duration
  /**
   * The upper bound of any single delay.
   */
  readonly max: Duration.Duration
  /**
   * Whether each delay is scaled by a random factor in `[0.5, 1]`.
   */
  readonly jitter: boolean
}

/**
 * HTTP basic credentials sent with the WebSocket handshake and with every
 * historical request.
 */
export interface Credentials {
  readonly username: string
  readonly password: Redacted.Redacted<string>
}

export interface ClientOptions {
  /**
   * The URL of the streaming endpoint, e.g. `wss://example.com/websocket`.
   */
  readonly url: string
  /**
   * The base URL of the historical API, e.g. `https://example.com/`.
   */
  readonly historicalUrl: string
  readonly handshakeTimeout: Duration.Duration
  /**
   * The interval between liveness probes on an idle connection.
   */
  readonly livenessInterval: Duration.Duration
  /**
   * How long to wait for the answer to a liveness probe.
   */
  readonly livenessTimeout: Duration.Duration
  readonly backoff: BackoffOptions
  /**
   * The number of consecutive failed reconnection attempts after which the
   * client gives up. `0` means unlimited.
   */
  readonly maxReconnectAttempts: number
  /**
   * The number of undelivered events buffered per subscription.
   */
  readonly bufferCapacity: number
  readonly backpressure: BackpressurePolicy
  readonly credentials: Option.Option<Credentials>
}

/**
 * The options accepted by `layerConfig`. Everything but the URL has a
 * default.
 */
export interface ClientOptionsInput {
  readonly url: string
  readonly historicalUrl?: string | undefined
  readonly handshakeTimeout?: Duration.DurationInput | undefined
  readonly livenessInterval?: Duration.DurationInput | undefined
  readonly livenessTimeout?: Duration.DurationInput | undefined
  readonly backoff?: {
    readonly base?: Duration.DurationInput | undefined
    readonly max?: Duration.DurationInput | undefined
    readonly jitter?: boolean | undefined
  } | undefined
  readonly maxReconnectAttempts?: number | undefined
  readonly bufferCapacity?: number | undefined
  readonly backpressure?: BackpressurePolicy | undefined
  readonly credentials?: {
    readonly username: string
    readonly password: string | Redacted.Redacted<string>
  } | undefined
}

export const defaults = {
  historicalUrl: "http://localhost:8080/",
  handshakeTimeout: Duration.seconds(10),
  livenessInterval: Duration.seconds(15),
  livenessTimeout: Duration.seconds(10),
  backoff: {
    base: Duration.millis(500),
    max: Duration.seconds(30),
    jitter: true
  },
  maxReconnectAttempts: 0,
  bufferCapacity: 1024,
  backpressure: "suspend"
} as const satisfies Omit<ClientOptions, "url" | "credentials">

// =============================================================================
// Service
// =============================================================================

/**
 * The resolved configuration of the client.
 */
export class ClientConfig extends Context.Tag("ChainStream/ClientConfig")<
  ClientConfig,
  ClientOptions
>() {}

/**
 * Fills in the defaults of the given options.
 */
export const make = (options: ClientOptionsInput): ClientOptions => ({
  url: options.url,
  historicalUrl: options.historicalUrl ?? defaults.historicalUrl,
  handshakeTimeout: Duration.decode(options.handshakeTimeout ?? defaults.handshakeTimeout),
  livenessInterval: Duration.decode(options.livenessInterval ?? defaults.livenessInterval),
  livenessTimeout: Duration.decode(options.livenessTimeout ?? defaults.livenessTimeout),
  backoff: {
    base: Duration.decode(options.backoff?.base ?? defaults.backoff.base),
    max: Duration.decode(options.backoff?.max ?? defaults.backoff.max),
    jitter: options.backoff?.jitter ?? defaults.backoff.jitter
  },
  maxReconnectAttempts: Math.max(0, Math.floor(options.maxReconnectAttempts ?? defaults.maxReconnectAttempts)),
  bufferCapacity: Math.max(1, Math.floor(options.bufferCapacity ?? defaults.bufferCapacity)),
  backpressure: options.backpressure ?? defaults.backpressure,
  credentials: Option.fromNullable(options.credentials).pipe(
    Option.map(({ password, username }) => ({
      username,
      password: Redacted.isRedacted(password) ? password : Redacted.make(password)
    }))
  )
})

/**
 * A layer which provides the client configuration from the given options.
 */
export const layerConfig = (options: ClientOptionsInput): Layer.Layer<ClientConfig> =>
  Layer.succeed(ClientConfig, make(options))

const fromEnv: Config.Config<ClientOptions> = Config.all({
  url: Config.string("CHAINSTREAM_URL"),
  historicalUrl: Config.string("CHAINSTREAM_HISTORICAL_URL").pipe(
    Config.withDefault(defaults.historicalUrl)
  ),
  handshakeTimeout: Config.duration("CHAINSTREAM_HANDSHAKE_TIMEOUT").pipe(
    Config.withDefault(defaults.handshakeTimeout)
  ),
  livenessInterval: Config.duration("CHAINSTREAM_LIVENESS_INTERVAL").pipe(
    Config.withDefault(defaults.livenessInterval)
  ),
  livenessTimeout: Config.duration("CHAINSTREAM_LIVENESS_TIMEOUT").pipe(
    Config.withDefault(defaults.livenessTimeout)
  ),
  backoff: Config.all({
    base: Config.duration("CHAINSTREAM_BACKOFF_BASE").pipe(Config.withDefault(defaults.backoff.base)),
    max: Config.duration("CHAINSTREAM_BACKOFF_MAX").pipe(Config.withDefault(defaults.backoff.max)),
    jitter: Config.boolean("CHAINSTREAM_BACKOFF_JITTER").pipe(Config.withDefault(defaults.backoff.jitter))
  }),
  maxReconnectAttempts: Config.integer("CHAINSTREAM_MAX_RECONNECT_ATTEMPTS").pipe(
    Config.validate({ message: "Expected a non-negative integer", validation: (n) => n >= 0 }),
    Config.withDefault(defaults.maxReconnectAttempts)
  ),
  bufferCapacity: Config.integer("CHAINSTREAM_BUFFER_CAPACITY").pipe(
    Config.validate({ message: "Expected a positive integer", validation: (n) => n > 0 }),
    Config.withDefault(defaults.bufferCapacity)
  ),
  backpressure: Config.literal("suspend", "drop-oldest", "fail")("CHAINSTREAM_BACKPRESSURE").pipe(
    Config.withDefault(defaults.backpressure)
  ),
  credentials: Config.option(Config.all({
    username: Config.string("CHAINSTREAM_USERNAME"),
    password: Config.redacted("CHAINSTREAM_PASSWORD")
  }))
})

/**
 * A layer which reads the client configuration from the environment.
 *
 * Only `CHAINSTREAM_URL` is required. Credentials are used when both
 * `CHAINSTREAM_USERNAME` and `CHAINSTREAM_PASSWORD` are set.
 */
export const layerConfigFromEnv: Layer.Layer<ClientConfig, ConfigError.ConfigError> = Layer.effect(
  ClientConfig,
  Effect.gen(function*() {
    return yield* fromEnv
  })
)

// =============================================================================
// Utilities
// =============================================================================

/**
 * Computes the value of the `Authorization` header for the given credentials.
 */
export const authorization = (credentials: Credentials): string =>
  `Basic ${Encoding.encodeBase64(`${credentials.username}:${Redacted.value(credentials.password)}`)}`
