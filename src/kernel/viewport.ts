import { z } from 'zod';
import { NavigatorConfigError } from './config';
import { ViewportSize } from './types';

export const ViewportSizeSchema = z.object({
    width:  z.number().finite().positive(),
    height: z.number().finite().positive(),
});

/** Anything that can answer "how big is the screen right now". */
export interface ViewportSource {
    readonly size: ViewportSize;
}

type ResizeListener = (size: ViewportSize) => void;

/**
 * Current viewport dimensions.  In a browser it follows window resize; in any
 * other host the owner passes a starting size and calls resize() itself.
 */
export class Viewport implements ViewportSource {
    private _size: ViewportSize;
    private readonly listeners: Set<ResizeListener> = new Set();
    private readonly resizeListener: () => void;
    private bound = false;

    constructor(initial?: ViewportSize) {
        const start = initial ? ViewportSizeSchema.parse(initial) : readWindowSize();
        if (start === null) {
            throw new NavigatorConfigError(['viewport: a starting size is required when no window is available']);
        }
        this._size = start;
        this.resizeListener = () => this.updateFromWindow();

        if (typeof window !== 'undefined') {
            window.addEventListener('resize', this.resizeListener);
            this.bound = true;
        }
    }

    get size(): ViewportSize {
        return this._size;
    }

    public resize(width: number, height: number): void {
        this._size = ViewportSizeSchema.parse({ width, height });
        for (const listener of Array.from(this.listeners)) {
            listener(this._size);
        }
    }

    public onResize(listener: ResizeListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private updateFromWindow(): void {
        const size = readWindowSize();
        if (size !== null) this.resize(size.width, size.height);
    }

    public destroy(): void {
        if (this.bound && typeof window !== 'undefined') {
            window.removeEventListener('resize', this.resizeListener);
            this.bound = false;
        }
        this.listeners.clear();
    }
}

function readWindowSize(): ViewportSize | null {
    if (typeof window === 'undefined' || !(window.innerWidth > 0) || !(window.innerHeight > 0)) {
        return null;
    }
    return { width: window.innerWidth, height: window.innerHeight };
}
