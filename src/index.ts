// Export types (DeviceStatus snapshot, connection config, events)
export * from './types';

// Export main class
export { FusionFlexDevice, FusionFlexDeviceOptions } from './device/FusionFlexDevice';

// Export protocol constants and encoders
export {
  FLEX_COMMANDS,
  FlexCommandName,
  MESSAGE_START,
  MESSAGE_END,
  MAX_PENDING_LENGTH,
  BAUD_RATE
} from './core/FlexConstants';
export { encodeCommand, encodeSetVolumeDecibels, encodeSelectInputSource } from './device/FlexCommands';

// Export volume conversion
export {
  MIN_VOLUME_DB,
  MAX_VOLUME_DB,
  VOLUME_STEP_DB,
  volumeFractionToDecibels,
  volumeDecibelsToFraction
} from './core/VolumeCodec';

// Export low-level protocol engine (for custom transports)
export { FrameAssembler, FrameAssemblerHandlers } from './core/FrameAssembler';
export { applyMessage, parseMessage, volumeFraction, formatStatus, INITIAL_STATUS } from './core/StatusMachine';

// Export transports
export * from './transport';

// Export configuration helpers
export { parseConnectionConfig, connectionConfigFromSettings, settingsFromEnv, ConnectionSettings } from './config';

// Export errors
export * from './utils/errors';
export {
  setupGlobalErrorHandlers,
  isNetworkError,
  GlobalErrorHandlerOptions
} from './utils/errorHandling';
