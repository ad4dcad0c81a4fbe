/**
 * Normalized UI events consumed by the InteractionController.
 *
 * Hosts translate their pointer/touch/wheel events into these; the canvas
 * core never touches a DOM.
 *
 * Mouse: drag-start/move/end, zoom (wheel)
 * Touch: per-finger down/move/up/cancel
 */

import type { ScreenPoint } from '../navigation/types';

export type UIEvent =
    // ─── Mouse/Pointer ───
    | { type: "drag-start"; screen: ScreenPoint }
    | { type: "drag-move"; screen: ScreenPoint }
    | { type: "drag-end"; screen: ScreenPoint }
    | { type: "zoom"; screen: ScreenPoint; delta: number }

    // ─── Touch: individual finger tracking ───
    | { type: "finger-down"; fingerId: number; screen: ScreenPoint }
    | { type: "finger-move"; fingerId: number; screen: ScreenPoint }
    | { type: "finger-up"; fingerId: number; screen: ScreenPoint }
    | { type: "finger-cancel"; fingerId: number; screen: ScreenPoint };

export type UIEventCallback = (event: UIEvent) => void;
