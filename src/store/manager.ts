import { StoreNotOpenedError } from "../errors.js";
import { Notebook } from "./notebook.js";
import type { NotebookOptions } from "./notebook.js";

/**
 * Holds the Notebook the server reads from. Opening again replaces it, which
 * drops every cached note and re-unlocks the keys.
 */
export class NotebookManager {
  private current: Notebook | null = null;

  constructor(
    private readonly passwords: () => Iterable<string>,
    private readonly options: NotebookOptions = {},
  ) {}

  get notebook(): Notebook {
    if (!this.current) {
      throw new StoreNotOpenedError();
    }
    return this.current;
  }

  get path(): string | null {
    return this.current?.directory ?? null;
  }

  open(directory: string): Notebook {
    // Build first so a failing open keeps the previous store readable.
    const notebook = new Notebook(directory, this.passwords(), this.options);
    this.current = notebook;
    return notebook;
  }

  isOpen(): boolean {
    return this.current !== null;
  }

  close(): void {
    this.current = null;
  }
}
