// Console
export { Console, CONSOLE_OWNER } from './console/Console.js';
export type { ConsoleInit } from './console/Console.js';
export { ConsoleDispatcher } from './console/dispatcher.js';
export { MarshaledConsole } from './console/marshaler.js';
export { KeyProcessor, getConsoleOwner } from './console/key-processor.js';
export type { ConsoleKey } from './console/key-processor.js';
export { InputHistory, HistoryNavigator } from './console/history.js';
export { InputLineTracker } from './console/input-line.js';
export type { InputLineTrackerOptions } from './console/input-line.js';
export { setRegionLockMode, UNLOCKED } from './console/regions.js';
export type {
	ReadOnlyRegionMode,
	RegionLockState,
	ConsoleColor,
	ColorSpan,
	PendingInputLine,
	ConsoleEvents,
	IStatusBar,
	IConsoleStatus,
	IUIShell,
	ConsoleServices,
	IConsole,
	ConsoleHost,
} from './console/types.js';

// Text surface
export { TextBuffer } from './text/TextBuffer.js';
export type {
	ITextBuffer,
	ReadOnlyRegion,
	ReadOnlyRegionEdit,
	TextChangedEvent,
	TextBufferEvents,
} from './text/TextBuffer.js';
export { HeadlessTextView } from './text/TextView.js';
export type {
	ITextView,
	Caret,
	MarginName,
	TextViewMargin,
	TextViewEvents,
	HeadlessTextViewOptions,
} from './text/TextView.js';
export { TextSnapshot, TextVersion, SnapshotPoint, SnapshotSpan } from './text/snapshot.js';
export type { LineExtent } from './text/snapshot.js';
export {
	createSpan,
	spanFromBounds,
	spanEnd,
	spansOverlap,
	translatePosition,
	translateSpan,
} from './text/types.js';
export type {
	Span,
	PointTrackingMode,
	SpanTrackingMode,
	EdgeInsertionMode,
	TextChange,
} from './text/types.js';

// Events
export { EventBus } from './events/EventBus.js';
export type { EventHandler } from './events/EventBus.js';

// Config & errors
export { resolveOptions, consoleOptionsSchema } from './config.js';
export type { ConsoleOptions, ResolvedConsoleOptions, Logger } from './config.js';
export { ConsoleError, ErrorCode } from './errors.js';
export type { ErrorCodeType } from './errors.js';
