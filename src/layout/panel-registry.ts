/**
 * PanelRegistry - strong owner of all panels of one diagram
 *
 * Groupers keep PanelIds only. An id that no longer resolves (the diagram was
 * closed or the panel removed) is treated as removed by every caller.
 *
 * Change notifications are blocked while a batch is open; nested batches flush
 * once when the outermost batch ends, and only if something changed.
 */

import { Panel, PanelId, toPanelId } from '../types.js';

export type RegistryListener = (panels: readonly Panel[]) => void;

export class PanelRegistry {
    private panels = new Map<PanelId, Panel>();
    private listeners: Set<RegistryListener> = new Set();
    private batchDepth = 0;
    private dirty = false;
    private counter = 0;
    private closed = false;

    /** Allocate a fresh, never reused id */
    nextId(prefix = 'panel'): PanelId {
        this.counter += 1;
        return toPanelId(`${prefix}-${this.counter}`);
    }

    add(panel: Panel): void {
        if (this.closed) {
            throw new Error('PanelRegistry is closed');
        }
        if (this.panels.has(panel.id)) {
            throw new Error(`Panel ${panel.id} is already registered`);
        }
        this.panels.set(panel.id, panel);
        this.touch();
    }

    get(id: PanelId): Panel | undefined {
        return this.panels.get(id);
    }

    has(id: PanelId): boolean {
        return this.panels.has(id);
    }

    /** Resolve ids in order, silently skipping the ones that are gone */
    resolve(ids: readonly PanelId[]): Panel[] {
        const result: Panel[] = [];
        for (const id of ids) {
            const panel = this.panels.get(id);
            if (panel) result.push(panel);
        }
        return result;
    }

    remove(id: PanelId): boolean {
        const removed = this.panels.delete(id);
        if (removed) this.touch();
        return removed;
    }

    all(): Panel[] {
        return Array.from(this.panels.values());
    }

    get size(): number {
        return this.panels.size;
    }

    isClosed(): boolean {
        return this.closed;
    }

    // ==================== BATCHING ====================

    isBatching(): boolean {
        return this.batchDepth > 0;
    }

    beginBatch(): void {
        this.batchDepth += 1;
    }

    endBatch(): void {
        if (this.batchDepth === 0) {
            throw new Error('endBatch() called without a matching beginBatch()');
        }
        this.batchDepth -= 1;
        if (this.batchDepth === 0 && this.dirty) {
            this.flush();
        }
    }

    /** Run `fn` with notifications blocked; one flush afterwards */
    batch<T>(fn: () => T): T {
        this.beginBatch();
        try {
            return fn();
        } finally {
            this.endBatch();
        }
    }

    /** Mark the panel set as changed */
    touch(): void {
        this.dirty = true;
        if (this.batchDepth === 0) {
            this.flush();
        }
    }

    subscribe(listener: RegistryListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Drop every panel. The registry accepts no new panels afterwards */
    close(): void {
        if (this.closed) return;
        this.panels.clear();
        this.closed = true;
        this.touch();
        this.listeners.clear();
    }

    private flush(): void {
        this.dirty = false;
        const snapshot = this.all();
        for (const listener of this.listeners) {
            listener(snapshot);
        }
    }
}
