/**
 * sihas-link – polling and command engine for SiHAS Wi-Fi home devices.
 */

// Device handle
export { Device, createDevice } from "./device.js";
export type { DeviceOptions } from "./device.js";

export {
  parseDeviceSetup,
  deviceSetupSchema,
  normalizeHost,
  normalizeMac,
  DEFAULT_POLL_INTERVAL_SECONDS,
  DEFAULT_TIMEOUT_MS,
} from "./config.js";
export type { DeviceSetup, DeviceSetupInput } from "./config.js";

// State, polling and commands
export { StateStore } from "./state.js";
export type { DeviceState, StateListener, StatePatch, StateUpdate } from "./state.js";

export { Poller, DEFAULT_FAILURE_THRESHOLD } from "./poller.js";
export type { PollPhase, PollResult, PollerOptions, RegisterReader } from "./poller.js";

export { CommandDispatcher } from "./dispatcher.js";
export type { CommandAck, CommandDispatcherOptions, RegisterWriter } from "./dispatcher.js";

// Profiles and codec
export {
  DEVICE_TYPES,
  resolve,
  planReads,
  isDeviceType,
  profileTypes,
  documentedConfigCodes,
  describeProfile,
} from "./profiles.js";
export type { CapabilitySet, DeviceType, ReadSpan } from "./profiles.js";

export {
  INVALID,
  decode,
  decodeChannel,
  encode,
  encodeChannel,
  findChannel,
  registersOf,
  colorTemperatureToMired,
  miredToColorTemperature,
  twosComplement,
  MIRED_COOLEST,
  MIRED_WARMEST,
} from "./codec.js";
export type {
  Access,
  Channel,
  ChannelKind,
  ChannelLayout,
  ChannelValue,
  ChannelValues,
  CounterChannel,
  EncodedWrite,
  Invalid,
  RegisterBlock,
} from "./codec.js";

// Errors
export { classify, toDeviceError } from "./classifier.js";
export type { Classification, FailureKind, RecoveryAction } from "./classifier.js";

export {
  SihasError,
  TransportTimeoutError,
  ConnectionError,
  DeviceClosedError,
  FeatureDisabledError,
  MalformedResponseError,
  UnknownProfileError,
  NotWritableError,
  ValidationError,
  ConfigurationError,
} from "./errors.js";
export type { ErrorKind } from "./errors.js";

// Wire level
export { RegisterClient } from "./client.js";
export type { RegisterClientOptions } from "./client.js";

export { TcpTransport } from "./transport.js";
export type { Transport, TransportAddress, TcpTransportOptions } from "./transport.js";

export {
  FunctionCode,
  DEFAULT_PORT,
  MAX_REGISTERS_PER_READ,
  DeviceExceptionError,
  headerChecksum,
  frameLength,
  readHoldingRegisters,
  writeSingleRegister,
  parseReadResponse,
  parseWriteResponse,
} from "./frame.js";

// Decoder utilities
export { SihasFrame, FrameKind, describeFrame } from "./decoder.js";

export { nullLogger, createConsoleLogger } from "./logger.js";
export type { Logger, LoggingOptions } from "./logger.js";
