export { NavigationController } from './controller/navigationController';
export type {
    InputEvent,
    NavigationControllerOptions,
    RenderOptions,
    RenderResult,
    SlotFailure,
} from './controller/navigationController';
export { INITIAL_STATE, clampState, maxCursorRow, maxIndex, maxShift } from './controller/navigation';
export type { NavigationState } from './controller/navigation';
export { MarqueeTimer } from './controller/marqueeTimer';
export { InactivityTimer } from './controller/inactivityTimer';
export type { InactivityTimerOptions } from './controller/inactivityTimer';

export { RootMenu, NestedMenu } from './menu/menu';
export type { Direction, ListMenuOptions, Menu, MenuBaseOptions, MenuEvent, MenuEventKind, MenuKind, ValueCallback } from './menu/menu';
export { FileMenu, PARENT_ENTRY } from './menu/fileMenu';
export type { FileEntry, FileMenuOptions, SlotTarget } from './menu/fileMenu';
export { nodeFileSystem } from './menu/fileSystem';
export type { DirEntry, FileSystem } from './menu/fileSystem';
export { DIVIDER, bind, dynamicSlot, resolveSlot, staticSlot, toSlot } from './menu/slot';
export type { DynamicSlot, ResolvedSlot, Slot, SlotBinding, SlotInput, StaticSlot } from './menu/slot';
export { composeLine, padLine } from './menu/format';

export { createGeometry } from './display/geometry';
export type { DisplayGeometry, DisplaySink } from './display/geometry';
export { MemoryDisplay } from './display/memoryDisplay';
export { TerminalDisplay } from './display/terminalDisplay';

export { attachKeypressInput, keyToInputEvent, DEFAULT_KEY_BINDINGS } from './input/keypressInput';
export type { KeyBindings, KeypressInputOptions } from './input/keypressInput';

export { BoundaryError, ConfigurationError, FormatError, MenuError, NotFoundError } from './errors';
export { loadConfig } from './configuration';
export type { Config, ControllerOptionsInput, MarqueeTimerOptions } from './configuration';
export { logger } from './ui/logger';
