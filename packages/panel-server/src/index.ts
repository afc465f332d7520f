export { loadContainerConfig, parseContainerConfig, formatZodIssues } from './config';
export {
  ConfigWatcher,
  diffContainerConfigs,
  type ConfigChangeTarget,
  type ContainerConfigDiff,
} from './configWatcher';
export {
  InstanceOrchestrator,
  type ApplyOutcome,
  type InstanceOrchestratorOptions,
  type InstanceTickReport,
} from './container/instanceOrchestrator';
export {
  MinimizeRegistry,
  type MinimizeRectangleSink,
} from './container/minimizeRegistry';
export {
  DEFAULT_DARK_BACKGROUND,
  DEFAULT_LIGHT_BACKGROUND,
  deriveBackgroundColor,
  type Rgba,
  type ThemeColors,
} from './container/themeColors';
export { loadEnvConfig, type EnvConfig } from './envConfig';
export { PanelError, isPanelError, type PanelErrorCode } from './errors';
export { PanelEventLoop, type TickTarget } from './eventLoop';
export {
  HeadlessCompositor,
  HeadlessLayerSurface,
  HeadlessPopup,
  type HeadlessSurfaceCall,
} from './headless';
export { silentLogger, withPrefix, type Logger } from './logger';
export { startPanelServer, type PanelServer, type PanelServerOptions } from './server';
export {
  AppletWindowCollection,
  type AppletWindow,
  type AppletWindowInput,
} from './space/appletWindows';
export { FocusTracker, resolveFocus, type FocusChannel } from './space/focus';
export {
  computeInputRegion,
  InputRegionManager,
  type InputRegionMode,
} from './space/inputRegion';
export {
  centerLeftSpacing,
  LayoutEngine,
  regionSum,
  type LayoutOutcome,
  type RegionSums,
} from './space/layoutEngine';
export {
  instanceKey,
  PanelInstance,
  type PanelInstanceEvent,
  type PanelRectSettings,
  type PanelSurfaceState,
  type VisibilityState,
  type WindowPlacement,
} from './space/panelInstance';
export { computeCornerRadii, computePanelRect } from './space/panelRect';
export { tickPanel, type PanelTickContext, type PanelTickResult } from './space/panelTick';
export { Region } from './space/region';
export { ResizeNegotiator, type ResizeOutcome } from './space/resizeNegotiator';
export {
  marginsForAnchor,
  type LayerShell,
  type LayerSurfaceHandle,
  type LayerSurfaceRequest,
  type PopupHandle,
  type PopupHost,
} from './space/surface';
export { smootherstep, VisibilityController } from './space/visibilityController';
