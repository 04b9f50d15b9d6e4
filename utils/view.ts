import type { ViewMode, ViewTransform } from '../types';
import { ZOOM_IN_FACTOR, ZOOM_MAX, ZOOM_MIN, ZOOM_OUT_FACTOR } from '../constants';

export const IDENTITY_VIEW: ViewTransform = { zoom: 1, centerX: 0, centerY: 0 };

/** Only the explorer pans and zooms; the stepper always shows the whole scene. */
export const isNavigable = (mode: ViewMode): boolean => mode === 'explorer';

export const viewForMode = (mode: ViewMode, view: ViewTransform): ViewTransform =>
    isNavigable(mode) ? view : IDENTITY_VIEW;

/** Wheel direction to zoom factor; null for a wheel event with no delta. */
export const wheelFactor = (deltaY: number): number | null => {
    if (deltaY > 0) return ZOOM_OUT_FACTOR;
    if (deltaY < 0) return ZOOM_IN_FACTOR;
    return null;
};

/**
 * Zooms by `factor` keeping the world point under the cursor fixed.
 * `offsetX`/`offsetY` are the cursor's pixel offsets from the viewport
 * centre, y pointing down as in DOM events. Past the zoom limits the view
 * is returned unchanged.
 */
export const zoomAt = (view: ViewTransform, factor: number, offsetX = 0, offsetY = 0): ViewTransform => {
    const zoom = view.zoom * factor;
    if (!Number.isFinite(zoom) || zoom < ZOOM_MIN || zoom > ZOOM_MAX) {
        console.info(`[zoom] limit reached: ${zoom.toFixed(2)}`);
        return view;
    }
    const worldX = view.centerX + offsetX / view.zoom;
    const worldY = view.centerY - offsetY / view.zoom;
    return {
        zoom,
        centerX: worldX - offsetX / zoom,
        centerY: worldY + offsetY / zoom,
    };
};

/** Drag by a pixel delta; content follows the pointer. */
export const panBy = (view: ViewTransform, dx: number, dy: number): ViewTransform => {
    if (!Number.isFinite(dx) || !Number.isFinite(dy)) return view;
    return {
        ...view,
        centerX: view.centerX - dx / view.zoom,
        centerY: view.centerY + dy / view.zoom,
    };
};
