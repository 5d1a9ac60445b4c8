import type { Readable } from "node:stream";

export type Container =
  | { readonly _tag: "Directory"; readonly path: string }
  | { readonly _tag: "Zip"; readonly path: string }
  | { readonly _tag: "Rar"; readonly path: string }
  | { readonly _tag: "Epub"; readonly path: string };

export type ContainerKind = Container["_tag"];

export interface ContainerEntry {
  /** Path inside the container, `/`-separated */
  readonly name: string;
  readonly isDirectory: boolean;
  /** Only valid while the reader that listed the entry is open */
  open(): Promise<Readable>;
}

export interface ContainerReader {
  readonly container: Container;
  /** Entries in the order the format stores them */
  entries(): Promise<ContainerEntry[]>;
  has(name: string): Promise<boolean>;
  open(name: string): Promise<Readable>;
  close(): Promise<void>;
}

export interface EpubPackageMetadata {
  title?: string;
  creator?: string;
  publisher?: string;
  description?: string;
  date?: string;
  modified?: string;
}

export interface EpubReader extends ContainerReader {
  readonly container: Extract<Container, { _tag: "Epub" }>;
  metadata(): Promise<EpubPackageMetadata>;
  /** Entry names of the images referenced by the reading-order pages, page by page */
  pageImages(): AsyncGenerator<string>;
}
