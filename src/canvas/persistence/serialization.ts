/**
 * Canvas document encoding (version 2).
 *
 * The document mirrors the sparse tree exactly: every tile stores its slot in
 * its parent (none for the top tile) and its existing children keyed by slot,
 * so loading reconstructs the same topology with the same tile ids.
 *
 * ```
 * { version: 2, timestamp, fractal: { gridSize, scale, tileExtent: [w, h] },
 *   root: TileDTO, view?: ViewDTO }
 * ```
 */

import { DocumentFormatError } from '@/common/errors';
import { GRID_SIZE, isValidAddress, type GridAddress } from '@/fractal/gridAddress';
import { createTileGeometry, SUBDIVISION, type TileGeometry } from '@/fractal/tileGeometry';
import { TileTree, type ContentFactory, type TileId, type TileRecord } from '@/fractal/TileTree';
import type { CameraState } from '../navigation/types';

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENT TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const DOCUMENT_VERSION = 2;

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type DocumentPath = (string | number)[];

export interface GridAddressDTO {
    col: number;
    row: number;
}

export interface ChildTileDTO {
    address: GridAddressDTO;
    tile: TileDTO;
}

export interface TileDTO {
    id: TileId;
    depth: number;
    address: GridAddressDTO | null;
    content: JsonValue;
    /** Row-major. */
    children: ChildTileDTO[];
}

export interface ViewDTO {
    activeTile: TileId;
    panOffset: [number, number];
    zoomScale: number;
    rotationAngle: number;
}

export interface CanvasDocument {
    version: typeof DOCUMENT_VERSION;
    /** ISO-8601 */
    timestamp: string;
    fractal: {
        gridSize: number;
        scale: number;
        tileExtent: [number, number];
    };
    root: TileDTO;
    view?: ViewDTO;
}

/**
 * Converts tile payloads to and from JSON. `decode` throws DocumentFormatError
 * (with `path`) on payloads it does not recognize.
 */
export interface ContentCodec<TContent> {
    encode(content: TContent): JsonValue;
    decode(value: unknown, path: DocumentPath): TContent;
}

export const NULL_CONTENT_CODEC: ContentCodec<null> = {
    encode: () => null,
    decode: (value, path) => {
        if (value !== null) {
            throw new DocumentFormatError('expected empty tile content', path);
        }
        return null;
    },
};

/** Codec for payloads that already are JSON, checked with `isContent` on load. */
export function createJsonContentCodec<TContent extends JsonValue>(
    isContent: (value: unknown) => value is TContent,
    description = 'tile content'
): ContentCodec<TContent> {
    return {
        encode: (content) => content,
        decode: (value, path) => {
            if (!isContent(value)) {
                throw new DocumentFormatError(`invalid ${description}`, path);
            }
            return value;
        },
    };
}

// ═══════════════════════════════════════════════════════════════════════════
// EXPORT
// ═══════════════════════════════════════════════════════════════════════════

export interface ExportOptions {
    /** Stored as the document's view. */
    camera?: CameraState;
    /** Default: now */
    timestamp?: Date;
}

/** Encode the whole document, starting from its current top tile. */
export function exportDocument<TContent>(
    tree: TileTree<TContent>,
    geometry: TileGeometry,
    codec: ContentCodec<TContent>,
    options: ExportOptions = {}
): CanvasDocument {
    const document: CanvasDocument = {
        version: DOCUMENT_VERSION,
        timestamp: (options.timestamp ?? new Date()).toISOString(),
        fractal: {
            gridSize: GRID_SIZE,
            scale: geometry.subdivision,
            tileExtent: [geometry.tileExtent.width, geometry.tileExtent.height],
        },
        root: encodeTile(tree, codec, tree.root()),
    };

    if (options.camera) {
        const { activeTile, panOffset, zoomScale, rotationAngle } = options.camera;
        document.view = { activeTile, panOffset: [panOffset.x, panOffset.y], zoomScale, rotationAngle };
    }
    return document;
}

function encodeTile<TContent>(tree: TileTree<TContent>, codec: ContentCodec<TContent>, id: TileId): TileDTO {
    const tile = tree.get(id);
    return {
        id: tile.id,
        depth: tile.depth,
        address: tile.address ? encodeAddress(tile.address) : null,
        content: codec.encode(tile.content),
        children: tree.childrenOf(id).map(({ address, tile: child }) => ({
            address: encodeAddress(address),
            tile: encodeTile(tree, codec, child),
        })),
    };
}

function encodeAddress(address: GridAddress): GridAddressDTO {
    return { col: address.col, row: address.row };
}

export function stringifyDocument(document: CanvasDocument): string {
    return JSON.stringify(document, null, 2);
}

// ═══════════════════════════════════════════════════════════════════════════
// IMPORT
// ═══════════════════════════════════════════════════════════════════════════

export interface LoadedDocument<TContent> {
    tree: TileTree<TContent>;
    geometry: TileGeometry;
    /** Stored view, unnormalized; null when the document has none. */
    camera: CameraState | null;
    timestamp: string;
}

export function parseDocument(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new DocumentFormatError(`document is not valid JSON (${reason})`, []);
    }
}

/**
 * Validate and load a decoded document.
 *
 * @param createContent - Payload factory for tiles created after loading
 * @throws DocumentFormatError when the document does not have the expected shape
 */
export function importDocument<TContent>(
    input: unknown,
    codec: ContentCodec<TContent>,
    createContent: ContentFactory<TContent>
): LoadedDocument<TContent> {
    const root = expectRecord(input, []);

    const version = root.version;
    if (version !== DOCUMENT_VERSION) {
        throw new DocumentFormatError(`unsupported document version ${JSON.stringify(version)}`, ['version']);
    }

    const timestamp = expectString(root.timestamp, ['timestamp']);
    if (Number.isNaN(Date.parse(timestamp))) {
        throw new DocumentFormatError('timestamp is not an ISO-8601 date', ['timestamp']);
    }

    const geometry = decodeFractal(root.fractal, ['fractal']);

    const records: TileRecord<TContent>[] = [];
    const seen = new Set<TileId>();
    decodeTile(root.root, ['root'], null, null, codec, records, seen);

    const tree = TileTree.fromSnapshot(createContent, records);
    const camera = root.view === undefined ? null : decodeView(root.view, ['view'], seen);

    return { tree, geometry, camera, timestamp };
}

function decodeFractal(value: unknown, path: DocumentPath): TileGeometry {
    const fractal = expectRecord(value, path);
    if (fractal.gridSize !== GRID_SIZE) {
        throw new DocumentFormatError(`unsupported grid size ${JSON.stringify(fractal.gridSize)}`, [...path, 'gridSize']);
    }
    if (fractal.scale !== SUBDIVISION) {
        throw new DocumentFormatError(`unsupported scale ${JSON.stringify(fractal.scale)}`, [...path, 'scale']);
    }

    const [width, height] = expectPair(fractal.tileExtent, [...path, 'tileExtent']);
    if (!(width > 0) || !(height > 0)) {
        throw new DocumentFormatError('tile extent must be positive', [...path, 'tileExtent']);
    }
    return createTileGeometry({ width, height });
}

function decodeTile<TContent>(
    value: unknown,
    path: DocumentPath,
    parent: TileId | null,
    expected: { address: GridAddress; depth: number } | null,
    codec: ContentCodec<TContent>,
    records: TileRecord<TContent>[],
    seen: Set<TileId>
): void {
    const tile = expectRecord(value, path);

    const id = expectInteger(tile.id, [...path, 'id']);
    if (seen.has(id)) {
        throw new DocumentFormatError(`duplicate tile id ${id}`, [...path, 'id']);
    }
    seen.add(id);

    const depth = expectInteger(tile.depth, [...path, 'depth']);
    const address = tile.address === null ? null : decodeAddress(tile.address, [...path, 'address']);

    if (expected === null) {
        if (address !== null) {
            throw new DocumentFormatError('top tile must not have an address', [...path, 'address']);
        }
    } else {
        if (address === null || address.col !== expected.address.col || address.row !== expected.address.row) {
            throw new DocumentFormatError('tile address does not match its slot in the parent', [...path, 'address']);
        }
        if (depth !== expected.depth) {
            throw new DocumentFormatError(`expected depth ${expected.depth}, found ${depth}`, [...path, 'depth']);
        }
    }

    records.push({ id, parent, address, depth, content: codec.decode(tile.content, [...path, 'content']) });

    const children = expectArray(tile.children, [...path, 'children']);
    const taken = new Set<number>();
    children.forEach((entry, index) => {
        const entryPath = [...path, 'children', index];
        const child = expectRecord(entry, entryPath);
        const childAddress = decodeAddress(child.address, [...entryPath, 'address']);
        const key = childAddress.row * GRID_SIZE + childAddress.col;
        if (taken.has(key)) {
            throw new DocumentFormatError('two children share a slot', [...entryPath, 'address']);
        }
        taken.add(key);
        decodeTile(child.tile, [...entryPath, 'tile'], id, { address: childAddress, depth: depth + 1 }, codec, records, seen);
    });
}

function decodeAddress(value: unknown, path: DocumentPath): GridAddress {
    const record = expectRecord(value, path);
    const address = {
        col: expectInteger(record.col, [...path, 'col']),
        row: expectInteger(record.row, [...path, 'row']),
    };
    if (!isValidAddress(address)) {
        throw new DocumentFormatError(`address (${address.col},${address.row}) is outside the grid`, path);
    }
    return address;
}

function decodeView(value: unknown, path: DocumentPath, tiles: ReadonlySet<TileId>): CameraState {
    const view = expectRecord(value, path);

    const activeTile = expectInteger(view.activeTile, [...path, 'activeTile']);
    if (!tiles.has(activeTile)) {
        throw new DocumentFormatError(`active tile ${activeTile} is not in the document`, [...path, 'activeTile']);
    }

    const [x, y] = expectPair(view.panOffset, [...path, 'panOffset']);
    const zoomScale = expectNumber(view.zoomScale, [...path, 'zoomScale']);
    if (!(zoomScale > 0)) {
        throw new DocumentFormatError('zoom scale must be positive', [...path, 'zoomScale']);
    }

    return {
        activeTile,
        panOffset: { x, y },
        zoomScale,
        rotationAngle: expectNumber(view.rotationAngle, [...path, 'rotationAngle']),
    };
}

// ─── Shape checks ───

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: DocumentPath): Record<string, unknown> {
    if (!isRecord(value)) {
        throw new DocumentFormatError('expected an object', path);
    }
    return value;
}

function expectArray(value: unknown, path: DocumentPath): unknown[] {
    if (!Array.isArray(value)) {
        throw new DocumentFormatError('expected an array', path);
    }
    return value;
}

function expectString(value: unknown, path: DocumentPath): string {
    if (typeof value !== 'string') {
        throw new DocumentFormatError('expected a string', path);
    }
    return value;
}

function expectNumber(value: unknown, path: DocumentPath): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new DocumentFormatError('expected a finite number', path);
    }
    return value;
}

function expectInteger(value: unknown, path: DocumentPath): number {
    const number = expectNumber(value, path);
    if (!Number.isInteger(number)) {
        throw new DocumentFormatError('expected an integer', path);
    }
    return number;
}

function expectPair(value: unknown, path: DocumentPath): [number, number] {
    const array = expectArray(value, path);
    if (array.length !== 2) {
        throw new DocumentFormatError('expected two numbers', path);
    }
    return [expectNumber(array[0], [...path, 0]), expectNumber(array[1], [...path, 1])];
}
