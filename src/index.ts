export { SpatialNavigator } from './navigator';
export type { RegionPresence, SpatialNavigatorOptions } from './navigator';
export { NavigationFacade } from './navigation_facade';
export type { NavigationTarget } from './navigation_facade';

export {
    NavigatorConfigError,
    NavigatorConfigSchema,
    parseNavigatorConfig,
    previewLabelFor,
    swipeBackEnabledFor,
} from './kernel/config';
export type {
    DetectionZone,
    NavigatorConfig,
    NavigatorConfigInput,
    PreviewConfig,
    ReturnButtonConfig,
    PreviewRenderer,
    ReturnButtonRenderer,
} from './kernel/config';

export { EventBus } from './kernel/event_bus';
export type { HapticSource, NavigatorEvents } from './kernel/event_bus';

export { displacementFor, entryVector, exitVector, incomingPosition, outgoingPosition } from './kernel/geometry_mapper';
export { GestureClassifier } from './kernel/gesture_classifier';
export type { ClassifierStatus, ClassifierUpdate } from './kernel/gesture_classifier';
export { TransitionSession } from './kernel/transition_session';
export type { SessionSnapshot, TransitionSessionOptions } from './kernel/transition_session';
export {
    PLATFORM_BACK_PROGRESS_LIMIT,
    PeripheralSwipeBackSession,
    SWIPE_BACK_COMMIT_THRESHOLD,
    SWIPE_BACK_HAPTIC_THRESHOLD,
} from './kernel/swipe_back_session';
export type { SwipeBackPhase, SwipeBackSnapshot } from './kernel/swipe_back_session';
export { PreviewOverlayEngine, anchorFor } from './kernel/preview_overlay';
export type { PreviewFrame, PreviewInput } from './kernel/preview_overlay';
export { AnimationFailure, EASINGS, ProgressAnimation, resolveEasing } from './kernel/progress_animation';
export type { AnimationSample, EasingFn, EasingName } from './kernel/progress_animation';
export { describeFrame, returnButtonPlacement } from './kernel/render_model';
export type { FrameInput, LayerFrame, LayerRole, RenderDescription, ReturnButtonFrame, ReturnIcon } from './kernel/render_model';
export { Viewport } from './kernel/viewport';
export type { ViewportSource } from './kernel/viewport';
export { LifecycleGateError, PluginSupervisor } from './kernel/plugin_supervisor';
export type { NavigatorPlugin, PluginContext, SupervisorState } from './kernel/plugin_supervisor';

export { HapticFeedbackPlugin } from './plugins/haptic_feedback_plugin';
export type { HapticActuator } from './plugins/haptic_feedback_plugin';
export { RegionCallbacksPlugin } from './plugins/region_callbacks_plugin';
export type { RegionCallbacks } from './plugins/region_callbacks_plugin';

export * from './kernel/types';
