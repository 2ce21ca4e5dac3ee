import { interpretPic } from './picClause.js';
import type { CopybookField, LineClass, PicKind } from './types.js';

interface OpenGroup {
  level: number;
  name: string;
}

/**
 * Open ancestor groups of the line being scanned. Levels strictly increase
 * from bottom to top.
 */
export class GroupStack {
  private readonly entries: OpenGroup[] = [];

  get depth(): number {
    return this.entries.length;
  }

  /** Drop every open group at `level` or deeper. */
  closeFrom(level: number): void {
    let top = this.entries[this.entries.length - 1];
    while (top !== undefined && top.level >= level) {
      this.entries.pop();
      top = this.entries[this.entries.length - 1];
    }
  }

  open(level: number, name: string): void {
    this.closeFrom(level);
    this.entries.push({ level, name });
  }

  topName(): string | null {
    return this.entries[this.entries.length - 1]?.name ?? null;
  }
}

/** A resolved field plus how its PIC clause was typed. */
export interface ResolvedField {
  field: CopybookField;
  kind: PicKind;
}

export class HierarchyResolver {
  private readonly groups = new GroupStack();

  group(level: number, name: string): void {
    this.groups.open(level, name);
  }

  // A PIC-bearing declaration is always a leaf: it is never pushed.
  field(level: number, name: string, pic: string): ResolvedField {
    this.groups.closeFrom(level);
    const { kind, sql_type, length } = interpretPic(pic);
    const field = Object.freeze({
      level,
      name,
      pic,
      sql_type,
      length,
      parent: this.groups.topName(),
    });
    return { field, kind };
  }

  accept(line: LineClass): ResolvedField | null {
    switch (line.kind) {
      case 'group':
        this.group(line.level, line.name);
        return null;
      case 'field':
        return this.field(line.level, line.name, line.pic);
      case 'skip':
        return null;
    }
  }
}
