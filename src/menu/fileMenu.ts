import { BoundaryError, ConfigurationError, NotFoundError } from '@/errors';
import { logger } from '@/ui/logger';
import { EMPTY_AFFIX, formatSource, parseAffix, type Affix } from './format';
import { nodeFileSystem, segmentCount, type DirEntry, type FileSystem } from './fileSystem';
import { MenuBase, assertIndex, type Menu, type MenuBaseOptions } from './menu';
import { DIVIDER, staticSlot, toSlot, type Slot, type SlotInput } from './slot';

export type FileMenuOptions = MenuBaseOptions & {
    /** Default and starting directory. */
    path: string;
    fileSystem?: FileSystem;
    /** Files must end with one of these; every file is listed when omitted. */
    extensions?: string[];
    showFolders?: boolean;
    /** Always shown above the listing. */
    prefixSlots?: SlotInput[];
    /** Shown after the prefix slots while at the default depth only. */
    rootSlots?: SlotInput[];
    /** Directories whose name starts with one of these are never listed. */
    hiddenFolderPrefixes?: string[];
    /** `"<prefix>#+#<suffix>"` wrapped around directory names. */
    dirAffix?: string;
    /** Per-extension affixes, e.g. `{ '.txt': '#+# (t)' }`. */
    fileAffixes?: Record<string, string>;
    /** Pressing a directory emits `dir_press` instead of opening it. */
    customFolderBehavior?: boolean;
};

export type FileEntry = DirEntry & {
    path: string;
};

export type SlotTarget =
    | { kind: 'prefix'; index: number }
    | { kind: 'root'; index: number }
    | { kind: 'parent' }
    | { kind: 'entry'; entry: FileEntry };

export const PARENT_ENTRY = '..';

function normalizeExtension(extension: string): string {
    const trimmed = extension.trim();
    return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

function compareNames(a: DirEntry, b: DirEntry): number {
    if (a.name === b.name) return 0;
    return a.name < b.name ? -1 : 1;
}

export class FileMenu extends MenuBase<'file'> {
    readonly kind = 'file' as const;
    readonly defaultPath: string;
    readonly extensions: readonly string[] | null;
    readonly showFolders: boolean;
    readonly hiddenFolderPrefixes: readonly string[];
    readonly customFolderBehavior: boolean;

    private readonly fs: FileSystem;
    private readonly dirAffix: Affix;
    private readonly fileAffixes: ReadonlyArray<[extension: string, affix: Affix]>;
    private prefixStore: Slot[];
    private rootStore: Slot[];
    private current: string;
    private depthFromDefault = 0;
    /** What the exposed slots were built from; `targetAt` reads this. */
    private entries: FileEntry[] = [];
    /** Most recent read of the current directory; `enterDirectory` checks against this. */
    private lastListing: FileEntry[] = [];

    constructor(opts: FileMenuOptions) {
        super(opts);
        this.fs = opts.fileSystem ?? nodeFileSystem;
        this.extensions = opts.extensions ? opts.extensions.map(normalizeExtension) : null;
        this.showFolders = opts.showFolders ?? true;
        this.hiddenFolderPrefixes = opts.hiddenFolderPrefixes ?? ['__'];
        this.customFolderBehavior = opts.customFolderBehavior ?? false;
        this.dirAffix = parseAffix(opts.dirAffix ?? '#+#', 'Directory');
        this.fileAffixes = parseFileAffixes(opts.fileAffixes ?? {});
        this.prefixStore = (opts.prefixSlots ?? []).map(toSlot);
        this.rootStore = (opts.rootSlots ?? []).map(toSlot);

        this.defaultPath = this.fs.normalize(opts.path);
        this.current = this.defaultPath;
        try {
            this.lastListing = this.readEntries(this.defaultPath);
        } catch (error) {
            if (error instanceof NotFoundError) {
                throw new ConfigurationError(`File menu start path is not readable: ${error.message}`);
            }
            throw error;
        }
        this.entries = this.lastListing;
        this.rebuild();
    }

    protected self(): Menu {
        return this;
    }

    get currentPath(): string {
        return this.current;
    }

    get depth(): number {
        return this.depthFromDefault;
    }

    get prefixSlots(): readonly Slot[] {
        return this.prefixStore;
    }

    get rootSlots(): readonly Slot[] {
        return this.rootStore;
    }

    /** Re-reads the current directory. Does not touch the exposed slots. */
    listEntries(): DirEntry[] {
        this.lastListing = this.readEntries(this.current);
        return this.lastListing.map(({ name, isDirectory }) => ({ name, isDirectory }));
    }

    /** Rebuilds the exposed slots from a fresh listing of the current directory. */
    refreshSlots(): void {
        this.lastListing = this.readEntries(this.current);
        this.entries = this.lastListing;
        this.rebuild();
    }

    enterDirectory(name: string): void {
        const entry = this.lastListing.find((candidate) => candidate.name === name);
        if (!entry || !entry.isDirectory) {
            throw new NotFoundError(`"${name}" is not a listed directory of ${this.current}`, this.fs.join(this.current, name));
        }
        this.moveTo(entry.path, this.depthFromDefault + 1);
    }

    returnToParent(): void {
        const parent = this.fs.parent(this.current);
        if (parent === null) {
            throw new BoundaryError(`${this.current} has no parent directory`);
        }
        this.moveTo(parent, this.depthFromDefault - 1);
    }

    /**
     * Jumps to an absolute path. Without an explicit depth the depth becomes
     * the segment difference to the default path, negative for ancestors.
     */
    setPath(path: string, depth?: number): void {
        if (depth !== undefined && (!Number.isInteger(depth) || depth < 0)) {
            throw new BoundaryError(`Depth must be a non-negative integer, got ${depth}`);
        }
        const target = this.fs.normalize(path);
        const nextDepth = depth ?? segmentCount(this.fs, target) - segmentCount(this.fs, this.defaultPath);
        this.moveTo(target, nextDepth);
    }

    returnToDefault(): void {
        this.moveTo(this.defaultPath, 0);
    }

    /** Stored only; call `refreshSlots()` to show them. */
    setPrefixSlots(slots: SlotInput[]): void {
        this.prefixStore = slots.map(toSlot);
    }

    /** Stored only; call `refreshSlots()` to show them. */
    setRootSlots(slots: SlotInput[]): void {
        this.rootStore = slots.map(toSlot);
    }

    override replaceSlot(index: number, slot: SlotInput): void {
        super.replaceSlot(index, slot);
        const replaced = this.items[index];
        const rootCount = this.visibleRootCount();
        if (index < this.prefixStore.length) {
            this.prefixStore[index] = replaced;
        } else if (index < this.prefixStore.length + rootCount) {
            this.rootStore[index - this.prefixStore.length] = replaced;
        }
    }

    targetAt(index: number): SlotTarget {
        assertIndex(index, this.items.length);
        const prefixCount = this.prefixStore.length;
        if (index < prefixCount) return { kind: 'prefix', index };
        const rootCount = this.visibleRootCount();
        if (index < prefixCount + rootCount) return { kind: 'root', index: index - prefixCount };
        const parentCount = this.hasParentSlot() ? 1 : 0;
        if (index < prefixCount + rootCount + parentCount) return { kind: 'parent' };
        return { kind: 'entry', entry: this.entries[index - prefixCount - rootCount - parentCount] };
    }

    private visibleRootCount(): number {
        return this.depthFromDefault === 0 ? this.rootStore.length : 0;
    }

    private hasParentSlot(): boolean {
        return this.depthFromDefault > 0 && this.fs.parent(this.current) !== null;
    }

    private moveTo(path: string, depth: number): void {
        const entries = this.readEntries(path);
        logger.debug(`[file-menu] ${this.current} -> ${path} (depth ${depth})`);
        this.current = path;
        this.depthFromDefault = depth;
        this.lastListing = entries;
        this.entries = entries;
        this.rebuild();
    }

    private readEntries(path: string): FileEntry[] {
        let listed: DirEntry[];
        try {
            listed = this.fs.list(path);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new NotFoundError(`Cannot list ${path}: ${reason}`, path);
        }
        // a name holding the divider cannot be split back into prefix, entry and suffix
        const unrepresentable = listed.filter((entry) => entry.name.includes(DIVIDER));
        if (unrepresentable.length > 0) {
            listed = listed.filter((entry) => !entry.name.includes(DIVIDER));
            logger.warn(`[file-menu] skipped ${unrepresentable.length} entries of ${path} containing "${DIVIDER}"`, unrepresentable.map((entry) => entry.name));
        }
        const folders = this.showFolders
            ? listed.filter((entry) => entry.isDirectory && !this.hiddenFolderPrefixes.some((prefix) => entry.name.startsWith(prefix)))
            : [];
        const files = listed.filter((entry) => !entry.isDirectory && this.acceptsFile(entry.name));
        return [...folders.sort(compareNames), ...files.sort(compareNames)].map((entry) => ({
            name: entry.name,
            isDirectory: entry.isDirectory,
            path: this.fs.join(path, entry.name),
        }));
    }

    private acceptsFile(name: string): boolean {
        return this.extensions === null || this.extensions.some((extension) => name.endsWith(extension));
    }

    private affixFor(entry: DirEntry): Affix {
        if (entry.isDirectory) return this.dirAffix;
        const match = this.fileAffixes.find(([extension]) => entry.name.endsWith(extension));
        return match ? match[1] : EMPTY_AFFIX;
    }

    private rebuild(): void {
        const slots: Slot[] = [...this.prefixStore];
        if (this.depthFromDefault === 0) {
            slots.push(...this.rootStore);
        }
        if (this.hasParentSlot()) {
            slots.push(staticSlot(formatSource(this.dirAffix, PARENT_ENTRY)));
        }
        for (const entry of this.entries) {
            slots.push(staticSlot(formatSource(this.affixFor(entry), entry.name)));
        }
        this.items = slots;
    }
}

/** Longest extension first, so `.tar.gz` wins over `.gz`. */
function parseFileAffixes(affixes: Record<string, string>): Array<[string, Affix]> {
    const parsed = new Map<string, Affix>();
    for (const [key, value] of Object.entries(affixes)) {
        const extension = normalizeExtension(key);
        if (parsed.has(extension)) {
            throw new ConfigurationError(`Conflicting affixes for extension "${extension}"`);
        }
        parsed.set(extension, parseAffix(value, `"${extension}"`));
    }
    return [...parsed.entries()].sort((a, b) => b[0].length - a[0].length);
}
