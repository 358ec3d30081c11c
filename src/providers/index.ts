export type { ILogProvider, LogEvent, LogLevel, ApiCallLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export type { INotificationProvider } from './INotificationProvider.js';
export { safeNotify } from './INotificationProvider.js';
export { LogNotificationProvider } from './LogNotificationProvider.js';
export type {
  IVideoPlatformProvider,
  PlatformSearchItem,
  PlatformSearchQuery,
  PlatformVideo,
} from './IVideoPlatformProvider.js';
export { PlatformHttpError } from './IVideoPlatformProvider.js';
export { YouTubeDataProvider } from './YouTubeDataProvider.js';
