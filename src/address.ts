import { MalformedAddressError } from './errors.js';

/** Version carried by an address that names no particular version; omitted from the canonical form. */
export const DEFAULT_VERSION = 0;

const ADDRESS_PATTERN = /^([^/]*)\/([^:]+):([^@]+)(?:@(\d+))?$/;

export interface PageAddressFields {
  root: string;
  type: string;
  id: string;
  version?: number;
}

export type PageAddressInput = PageAddress | PageAddressFields | string;

/**
 * Immutable `(root, type, id, version)` identifier of a page.
 *
 * Canonical string form is `root/type:id@version`, with `@version` left out when the
 * version is {@link DEFAULT_VERSION}. {@link PageAddress.parse} is the exact inverse of
 * {@link PageAddress.format}.
 */
export class PageAddress {
  readonly root: string;
  readonly type: string;
  readonly id: string;
  readonly version: number;

  constructor(root: string, type: string, id: string, version: number = DEFAULT_VERSION) {
    const label = `${root}/${type}:${id}@${String(version)}`;
    if (root.includes('/')) throw new MalformedAddressError(label, `root cannot contain '/': ${root}`);
    if (type.length === 0) throw new MalformedAddressError(label, 'type cannot be empty');
    if (/[/:@]/.test(type)) throw new MalformedAddressError(label, `type cannot contain '/', ':', or '@': ${type}`);
    if (id.length === 0) throw new MalformedAddressError(label, 'id cannot be empty');
    if (/[:@]/.test(id)) throw new MalformedAddressError(label, `id cannot contain ':' or '@': ${id}`);
    if (!Number.isSafeInteger(version) || version < 0) {
      throw new MalformedAddressError(label, `version must be a non-negative integer: ${String(version)}`);
    }
    this.root = root;
    this.type = type;
    this.id = id;
    this.version = version;
    Object.freeze(this);
  }

  static parse(input: PageAddressInput): PageAddress {
    if (input instanceof PageAddress) return input;
    if (typeof input !== 'string') {
      return new PageAddress(input.root, input.type, input.id, input.version ?? DEFAULT_VERSION);
    }
    const match = ADDRESS_PATTERN.exec(input);
    if (match === null) {
      throw new MalformedAddressError(input, 'expected root/type:id@version or root/type:id');
    }
    const [, root, type, id, versionText] = match;
    const version = versionText === undefined ? DEFAULT_VERSION : Number.parseInt(versionText, 10);
    if (!Number.isSafeInteger(version)) {
      throw new MalformedAddressError(input, `invalid version number: ${versionText ?? ''}`);
    }
    return new PageAddress(root, type, id, version);
  }

  static tryParse(input: string): PageAddress | undefined {
    try {
      return PageAddress.parse(input);
    } catch {
      return undefined;
    }
  }

  static isAddress(value: unknown): value is PageAddress {
    return value instanceof PageAddress;
  }

  static compare(a: PageAddress, b: PageAddress): number {
    if (a.root !== b.root) return a.root < b.root ? -1 : 1;
    if (a.type !== b.type) return a.type < b.type ? -1 : 1;
    if (a.id !== b.id) return a.id < b.id ? -1 : 1;
    return a.version - b.version;
  }

  /** Version-less part, `root/type:id`. Every version of one page shares it. */
  get prefix(): string {
    return `${this.root}/${this.type}:${this.id}`;
  }

  get key(): string {
    return this.format();
  }

  get isVersioned(): boolean {
    return this.version !== DEFAULT_VERSION;
  }

  format(): string {
    return this.version === DEFAULT_VERSION ? this.prefix : `${this.prefix}@${String(this.version)}`;
  }

  withVersion(version: number): PageAddress {
    return new PageAddress(this.root, this.type, this.id, version);
  }

  withType(type: string): PageAddress {
    return new PageAddress(this.root, type, this.id, this.version);
  }

  equals(other: unknown): boolean {
    return other instanceof PageAddress
      && other.root === this.root
      && other.type === this.type
      && other.id === this.id
      && other.version === this.version;
  }

  toString(): string {
    return this.format();
  }

  toJSON(): string {
    return this.format();
  }
}
