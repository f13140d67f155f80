import { Direction, PeripheralRegion, Region, directionRevealing } from './kernel/types';

/** What a facade drives.  SpatialNavigator implements this with its own clock. */
export interface NavigationTarget {
    navigate(direction: Direction): boolean;
    returnToCenter(): boolean;
    readonly activeRegion: Region;
}

/**
 * Imperative handle for host code.  Every call is the programmatic twin of
 * a gesture and obeys the same guards: navigation only from IDLE, return
 * only from PERIPHERAL_ACTIVE.  A rejected call returns false.
 *
 * Detached, the facade reports CENTER and every call is ignored.
 */
export class NavigationFacade {
    private target: NavigationTarget | null = null;

    attach(target: NavigationTarget): void {
        this.target = target;
    }

    detach(): void {
        this.target = null;
    }

    get isAttached(): boolean {
        return this.target !== null;
    }

    currentRegion(): Region {
        return this.target?.activeRegion ?? 'CENTER';
    }

    navigate(direction: Direction): boolean {
        return this.target?.navigate(direction) ?? false;
    }

    /** Opens `region` by the swipe that reveals it. */
    navigateTo(region: PeripheralRegion): boolean {
        return this.navigate(directionRevealing(region));
    }

    navigateLeft(): boolean {
        return this.navigateTo('LEFT');
    }

    navigateRight(): boolean {
        return this.navigateTo('RIGHT');
    }

    navigateTop(): boolean {
        return this.navigateTo('TOP');
    }

    navigateBottom(): boolean {
        return this.navigateTo('BOTTOM');
    }

    returnToCenter(): boolean {
        return this.target?.returnToCenter() ?? false;
    }
}
