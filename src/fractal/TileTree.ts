/**
 * TileTree - sparse arena of tiles, each subdividing into a 5x5 grid of children.
 *
 * Tiles are addressed by stable integer ids. Each node keeps its parent id,
 * its slot in that parent and a sparse child map, so parent/child navigation
 * is O(1) in both directions without reference cycles.
 *
 * The tree has no fixed root: `ensureParent` grows a new top tile on demand
 * ("universe expansion"), which is what lets a camera zoom out and pan forever.
 * Nothing is ever removed; tiles persist for the life of the document.
 */

import {
    CENTER_ADDRESS,
    addressFromKey,
    addressKey,
    formatAddress,
    isValidAddress,
    offsetAddress,
    wrapAddress,
    type AddressKey,
    type GridAddress,
    type GridDirection,
} from './gridAddress';
import { assertContract, TreeContractError } from '@/common/errors';
import { navTrace } from '@/utils/navTrace';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type TileId = number;

/**
 * Read-only view of a tile handed to collaborators (renderers, hit-testers).
 */
export interface Tile<TContent> {
    readonly id: TileId;
    readonly parent: TileId | null;
    /** Slot inside `parent`; null only for the current top tile. */
    readonly address: GridAddress | null;
    readonly children: ReadonlyMap<AddressKey, TileId>;
    /** Depth relative to the document's first tile (negative = outside it). Fixed at creation. */
    readonly depth: number;
    /** Opaque payload owned by collaborators. */
    readonly content: TContent;
}

interface TileNode<TContent> {
    readonly id: TileId;
    parent: TileId | null;
    address: GridAddress | null;
    readonly children: Map<AddressKey, TileId>;
    readonly depth: number;
    content: TContent;
}

/** Builds the payload attached to a tile when it is created. */
export type ContentFactory<TContent> = (tile: { readonly id: TileId; readonly depth: number }) => TContent;

/** Flat description of one tile, used to restore a tree from a document. */
export interface TileRecord<TContent> {
    readonly id: TileId;
    readonly parent: TileId | null;
    readonly address: GridAddress | null;
    readonly depth: number;
    readonly content: TContent;
}

export interface ChildEntry {
    readonly address: GridAddress;
    readonly tile: TileId;
}

/**
 * Read side of the tree, independent of the content type.
 */
export interface TileTopology {
    readonly size: number;
    readonly revision: number;
    readonly origin: TileId;
    root(): TileId;
    has(id: TileId): boolean;
    get(id: TileId): Tile<unknown>;
    childrenOf(id: TileId): ChildEntry[];
    childIfExists(id: TileId, address: GridAddress): TileId | null;
    neighborIfExists(id: TileId, direction: GridDirection): TileId | null;
    ancestors(id: TileId): TileId[];
    pathFromRoot(id: TileId): GridAddress[];
}

// ═══════════════════════════════════════════════════════════════════════════
// TILE TREE
// ═══════════════════════════════════════════════════════════════════════════

export class TileTree<TContent> implements TileTopology {
    private readonly nodes = new Map<TileId, TileNode<TContent>>();
    private readonly createContent: ContentFactory<TContent>;
    private nextId: TileId = 0;
    private top: TileId;
    private _revision = 0;

    /** The tile the document started from (depth 0). */
    readonly origin: TileId;

    /**
     * @param createContent - Payload factory for lazily created tiles
     * @param records - Restore these tiles instead of creating a fresh origin tile
     */
    constructor(createContent: ContentFactory<TContent>, records?: readonly TileRecord<TContent>[]) {
        this.createContent = createContent;

        if (records && records.length > 0) {
            this.top = this.restore(records);
            this.origin = this.findOrigin();
        } else {
            const first = this.allocate(null, null, 0);
            this.top = first.id;
            this.origin = first.id;
        }
    }

    /** Rebuild a tree from flat records, keeping their ids. */
    static fromSnapshot<TContent>(
        createContent: ContentFactory<TContent>,
        records: readonly TileRecord<TContent>[]
    ): TileTree<TContent> {
        assertContract(records.length > 0, 'snapshot has no tiles');
        return new TileTree(createContent, records);
    }

    // ─── Lookup ───

    get size(): number {
        return this.nodes.size;
    }

    /** Incremented on every structural or content change. */
    get revision(): number {
        return this._revision;
    }

    /** Current top of the document (the only tile without a parent). */
    root(): TileId {
        return this.top;
    }

    has(id: TileId): boolean {
        return this.nodes.has(id);
    }

    get(id: TileId): Tile<TContent> {
        return this.node(id);
    }

    forEach(visit: (tile: Tile<TContent>) => void): void {
        for (const node of this.nodes.values()) {
            visit(node);
        }
    }

    /** Existing children in row-major order. */
    childrenOf(id: TileId): ChildEntry[] {
        const node = this.node(id);
        return [...node.children.entries()]
            .sort(([a], [b]) => a - b)
            .map(([key, tile]) => ({ address: addressFromKey(key), tile }));
    }

    setContent(id: TileId, content: TContent): void {
        this.node(id).content = content;
        this._revision += 1;
    }

    // ─── Parent / child ───

    /**
     * Existing child at `address`, created on first access.
     * Out-of-grid addresses are a caller bug: wrap or clamp first.
     */
    child(id: TileId, address: GridAddress): TileId {
        assertContract(isValidAddress(address), `child address out of grid: ${formatAddress(address)}`);
        const node = this.node(id);
        const key = addressKey(address);
        const existing = node.children.get(key);
        if (existing !== undefined) {
            return existing;
        }

        const created = this.allocate(id, { col: address.col, row: address.row }, node.depth + 1);
        node.children.set(key, created.id);
        return created.id;
    }

    childIfExists(id: TileId, address: GridAddress): TileId | null {
        if (!isValidAddress(address)) return null;
        return this.node(id).children.get(addressKey(address)) ?? null;
    }

    /**
     * Parent of `id`. A top tile gets a brand new parent with itself placed at the centre slot.
     */
    ensureParent(id: TileId): TileId {
        const node = this.node(id);
        if (node.parent !== null) {
            return node.parent;
        }

        const parent = this.allocate(null, null, node.depth - 1);
        node.parent = parent.id;
        node.address = CENTER_ADDRESS;
        parent.children.set(addressKey(CENTER_ADDRESS), node.id);
        this.top = parent.id;

        navTrace('Tree', 'ensureParent', { child: id, parent: parent.id, depth: parent.depth });
        return parent.id;
    }

    // ─── Same-depth neighbours ───

    /**
     * Same-depth tile adjacent to `id`.
     *
     * Sibling when the next slot is inside the parent; otherwise the cousin in the
     * parent's own neighbour ("uncle"), found recursively. Recursion depth is the
     * number of consecutive boundary tiles crossed, not the pan distance.
     */
    neighbor(id: TileId, direction: GridDirection): TileId {
        this.ensureParent(id);
        const { parent, address } = this.placement(id);

        const next = offsetAddress(address, direction);
        if (isValidAddress(next)) {
            return this.child(parent, next);
        }

        const uncle = this.neighbor(parent, direction);
        return this.child(uncle, wrapAddress(next));
    }

    /** Non-instantiating variant of `neighbor`; null when any tile on the path is missing. */
    neighborIfExists(id: TileId, direction: GridDirection): TileId | null {
        const node = this.node(id);
        if (node.parent === null || node.address === null) {
            return null;
        }

        const next = offsetAddress(node.address, direction);
        if (isValidAddress(next)) {
            return this.childIfExists(node.parent, next);
        }

        const uncle = this.neighborIfExists(node.parent, direction);
        return uncle === null ? null : this.childIfExists(uncle, wrapAddress(next));
    }

    // ─── Paths ───

    topmost(id: TileId): TileId {
        let current = this.node(id);
        while (current.parent !== null) {
            current = this.node(current.parent);
        }
        return current.id;
    }

    /** Ancestors of `id`, nearest first. */
    ancestors(id: TileId): TileId[] {
        const result: TileId[] = [];
        let current = this.node(id);
        while (current.parent !== null) {
            result.push(current.parent);
            current = this.node(current.parent);
        }
        return result;
    }

    /** Slots to follow from the current root down to `id`. */
    pathFromRoot(id: TileId): GridAddress[] {
        const path: GridAddress[] = [];
        let current = this.node(id);
        while (current.parent !== null && current.address !== null) {
            path.push(current.address);
            current = this.node(current.parent);
        }
        return path.reverse();
    }

    /** Follow `path` from the current root, creating tiles on the way. */
    tileAtPath(path: readonly GridAddress[]): TileId {
        let current = this.top;
        for (const address of path) {
            current = this.child(current, address);
        }
        return current;
    }

    // ─── Consistency ───

    /**
     * Check bidirectional parent/child links and the single-root property.
     * @returns Human-readable problems; empty when the tree is consistent
     */
    verifyConsistency(): string[] {
        const problems: string[] = [];
        let roots = 0;

        for (const node of this.nodes.values()) {
            if (node.parent === null) {
                roots += 1;
                if (node.address !== null) {
                    problems.push(`tile ${node.id} has an address but no parent`);
                }
            } else {
                const parent = this.nodes.get(node.parent);
                if (!parent) {
                    problems.push(`tile ${node.id} points at missing parent ${node.parent}`);
                } else if (node.address === null) {
                    problems.push(`tile ${node.id} has a parent but no address`);
                } else if (parent.children.get(addressKey(node.address)) !== node.id) {
                    problems.push(`tile ${node.id} is not registered at ${formatAddress(node.address)} of ${parent.id}`);
                } else if (node.depth !== parent.depth + 1) {
                    problems.push(`tile ${node.id} depth ${node.depth} does not follow parent depth ${parent.depth}`);
                }
            }

            for (const [key, childId] of node.children) {
                const child = this.nodes.get(childId);
                if (!child) {
                    problems.push(`tile ${node.id} lists missing child ${childId}`);
                } else if (child.parent !== node.id || child.address === null || addressKey(child.address) !== key) {
                    problems.push(`child ${childId} of ${node.id} does not point back at slot ${formatAddress(addressFromKey(key))}`);
                }
            }
        }

        if (roots !== 1) {
            problems.push(`expected exactly one top tile, found ${roots}`);
        }
        return problems;
    }

    // ═══════════════════════════════════════════════════════════════════════
    // PRIVATE
    // ═══════════════════════════════════════════════════════════════════════

    private node(id: TileId): TileNode<TContent> {
        const node = this.nodes.get(id);
        if (!node) {
            throw new TreeContractError(`unknown tile id ${id}`);
        }
        return node;
    }

    private placement(id: TileId): { parent: TileId; address: GridAddress } {
        const node = this.node(id);
        assertContract(node.parent !== null && node.address !== null, `tile ${id} has no parent`);
        return { parent: node.parent, address: node.address };
    }

    private allocate(parent: TileId | null, address: GridAddress | null, depth: number): TileNode<TContent> {
        const id = this.nextId;
        this.nextId += 1;
        const node: TileNode<TContent> = {
            id,
            parent,
            address,
            children: new Map(),
            depth,
            content: this.createContent({ id, depth }),
        };
        this.nodes.set(id, node);
        this._revision += 1;
        return node;
    }

    private restore(records: readonly TileRecord<TContent>[]): TileId {
        for (const record of records) {
            assertContract(!this.nodes.has(record.id), `duplicate tile id ${record.id}`);
            this.nodes.set(record.id, {
                id: record.id,
                parent: record.parent,
                address: record.address,
                children: new Map(),
                depth: record.depth,
                content: record.content,
            });
            this.nextId = Math.max(this.nextId, record.id + 1);
        }

        let top: TileId | null = null;
        for (const node of this.nodes.values()) {
            if (node.parent === null) {
                assertContract(top === null, `more than one top tile (${top}, ${node.id})`);
                top = node.id;
                continue;
            }
            const parent = this.node(node.parent);
            assertContract(node.address !== null && isValidAddress(node.address), `tile ${node.id} needs a valid address`);
            const key = addressKey(node.address);
            assertContract(!parent.children.has(key), `slot ${formatAddress(node.address)} of ${parent.id} is taken twice`);
            parent.children.set(key, node.id);
        }

        assertContract(top !== null, 'restored tree has no top tile');
        return top;
    }

    /** Lowest-id depth-0 tile of a restored tree; the top tile when there is none. */
    private findOrigin(): TileId {
        let origin: TileId | null = null;
        for (const node of this.nodes.values()) {
            if (node.depth === 0 && (origin === null || node.id < origin)) {
                origin = node.id;
            }
        }
        return origin ?? this.top;
    }
}

export function createTileTree(): TileTree<null>;
export function createTileTree<TContent>(createContent: ContentFactory<TContent>): TileTree<TContent>;
export function createTileTree<TContent>(createContent?: ContentFactory<TContent>): TileTree<TContent> | TileTree<null> {
    return createContent ? new TileTree(createContent) : new TileTree<null>(() => null);
}
