import { EventEmitter } from 'events';

export type UdpAddress = { host: string; port: number };

/**
 * Physical link used to reach the amplifier
 */
export enum ConnectionType {
  SERIAL = 'serial',
  UDP = 'udp'
}

export interface SerialConnectionConfig {
  type: ConnectionType.SERIAL;
  /** Serial device name or path, e.g. /dev/ttyUSB0 or COM1 */
  path: string;
  /** Defaults to 9600, the only rate the amplifier speaks */
  baudRate?: number;
}

export interface UdpConnectionConfig {
  type: ConnectionType.UDP;
  remote: UdpAddress;
  /** Local bind address; 0.0.0.0 and an ephemeral port when omitted */
  local?: { ip?: string; port?: number };
}

export type ConnectionConfig = SerialConnectionConfig | UdpConnectionConfig;

/**
 * Input source mode of the amplifier
 * AUTO: automatic selection, INPUT_1 / INPUT_2: fixed input
 */
export enum SourceMode {
  AUTO = 'AUTO',
  INPUT_1 = 'INPUT_1',
  INPUT_2 = 'INPUT_2'
}

/**
 * Immutable snapshot of what the amplifier last reported.
 * Optional fields stay undefined until the device reports them.
 */
export interface FusionFlexStatus {
  readonly isTurnedOn: boolean;
  /** Volume in dB, -95.5 to 0 in 0.5 dB steps */
  readonly volumeDb?: number;
  readonly sourceMode?: SourceMode;
  readonly isMuted?: boolean;
}

/**
 * Connection lifecycle of a device instance
 */
export enum DevicePhase {
  /** Created, start() never called */
  IDLE = 'IDLE',
  /** Transport is being opened */
  STARTING = 'STARTING',
  /** Transport open, commands accepted */
  CONNECTED = 'CONNECTED',
  /** Stopped by the caller or closed by the transport */
  STOPPED = 'STOPPED'
}

/**
 * Information about a connection lost event
 */
export interface ConnectionLostInfo {
  /** Human-readable endpoint, e.g. udp://10.0.0.5:7000 */
  descriptor: string;
  /** Transport error, if the closure was caused by one */
  error?: Error;
  /** Timestamp when the event occurred */
  timestamp: number;
}

export interface FusionFlexEvents {
  statusChanged: (status: FusionFlexStatus) => void;
  phaseChanged: (phase: DevicePhase, previous: DevicePhase) => void;
  connectionLost: (info: ConnectionLostInfo) => void;
  error: (err: Error) => void;
}

export interface Disposable {
  dispose(): void;
}

export type FlexEventEmitter = EventEmitter & {
  on<U extends keyof FusionFlexEvents>(event: U, listener: FusionFlexEvents[U]): FlexEventEmitter;
  once<U extends keyof FusionFlexEvents>(event: U, listener: FusionFlexEvents[U]): FlexEventEmitter;
  off<U extends keyof FusionFlexEvents>(event: U, listener: FusionFlexEvents[U]): FlexEventEmitter;
  emit<U extends keyof FusionFlexEvents>(event: U, ...args: Parameters<FusionFlexEvents[U]>): boolean;
};

/**
 * Capability shared by every amplifier driver: a connection it can open and
 * close, and accessors describing where it connects to.
 */
export interface AmplifierDevice {
  readonly connection: ConnectionConfig;
  readonly connectionType: ConnectionType;
  readonly descriptor: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}
