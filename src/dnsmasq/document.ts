/**
 * Line-level model of a dnsmasq configuration file.
 *
 * Every line keeps its original text, so lines that are not edited serialise
 * back unchanged. Only the file's final newline is normalised: the output
 * always ends with exactly one "\n" unless the document is empty.
 */

export type ConfigLine =
  | { kind: "blank"; raw: string }
  | { kind: "comment"; raw: string }
  | { kind: "marker"; raw: string; subject: string; purpose: string }
  | { kind: "directive"; raw: string; key: string; value: string | null };

/** "# <subject> - <purpose>", e.g. "# eth1 - USB Ethernet Adapter" */
const MARKER_PATTERN = /^#\s*(\S+)\s+-\s+(.+?)\s*$/;

export function parseLine(raw: string): ConfigLine {
  const text = raw.trim();
  if (text === "") {
    return { kind: "blank", raw };
  }
  if (text.startsWith("#")) {
    const marker = MARKER_PATTERN.exec(text);
    if (marker?.[1] && marker[2]) {
      return { kind: "marker", raw, subject: marker[1], purpose: marker[2] };
    }
    return { kind: "comment", raw };
  }
  const eq = text.indexOf("=");
  if (eq === -1) {
    return { kind: "directive", raw, key: text, value: null };
  }
  return { kind: "directive", raw, key: text.slice(0, eq).trim(), value: text.slice(eq + 1).trim() };
}

export function formatMarker(subject: string, purpose: string): string {
  return `# ${subject} - ${purpose}`;
}

export class DnsmasqDocument {
  private constructor(private items: ConfigLine[]) {}

  static parse(text: string): DnsmasqDocument {
    if (text === "") return new DnsmasqDocument([]);
    const body = text.endsWith("\n") ? text.slice(0, -1) : text;
    return new DnsmasqDocument(body.split("\n").map(parseLine));
  }

  get lines(): readonly ConfigLine[] {
    return this.items;
  }

  serialize(): string {
    if (this.items.length === 0) return "";
    return this.items.map((line) => line.raw).join("\n") + "\n";
  }

  hasLine(line: string): boolean {
    return this.countLine(line) > 0;
  }

  countLine(line: string): number {
    const wanted = line.trim();
    return this.items.filter((item) => item.raw.trim() === wanted).length;
  }

  /** Adds `line` when absent and collapses duplicates to the first occurrence. */
  ensureSingletonLine(line: string): boolean {
    const wanted = line.trim();
    const first = this.items.findIndex((item) => item.raw.trim() === wanted);
    if (first === -1) {
      if (this.endsInsideBlock()) {
        this.items.push(parseLine(""));
      }
      this.items.push(parseLine(wanted));
      return true;
    }
    const before = this.items.length;
    this.items = this.items.filter((item, index) => index <= first || item.raw.trim() !== wanted);
    return this.items.length !== before;
  }

  /** Removes every line equal to `line` after trimming. */
  removeLine(line: string): boolean {
    const wanted = line.trim();
    return this.removeWhere((item) => item.raw.trim() === wanted) > 0;
  }

  removeWhere(predicate: (line: ConfigLine) => boolean): number {
    const before = this.items.length;
    this.items = this.items.filter((item) => !predicate(item));
    return before - this.items.length;
  }

  directives(key: string): Array<Extract<ConfigLine, { kind: "directive" }>> {
    const found: Array<Extract<ConfigLine, { kind: "directive" }>> = [];
    for (const item of this.items) {
      if (item.kind === "directive" && item.key === key) {
        found.push(item);
      }
    }
    return found;
  }

  hasBlock(marker: string): boolean {
    return this.findBlockStart(marker) !== -1;
  }

  /**
   * Block lines for `marker`: the marker itself up to (not including) the
   * next blank line or next marker. Empty when the marker is absent.
   */
  blockLines(marker: string): string[] {
    const start = this.findBlockStart(marker);
    if (start === -1) return [];
    return this.items.slice(start, this.blockEnd(start)).map((item) => item.raw);
  }

  /** Removes every block introduced by `marker`. */
  removeBlock(marker: string): boolean {
    let removed = false;
    let start = this.findBlockStart(marker);
    while (start !== -1) {
      this.items.splice(start, this.blockEnd(start) - start);
      // Drop the separator left behind when the block was the last thing in its paragraph.
      const previous = this.items[start - 1];
      const next = this.items[start];
      if (previous?.kind === "blank" && (next === undefined || next.kind === "blank")) {
        this.items.splice(start - 1, 1);
      } else if (previous === undefined && next?.kind === "blank") {
        this.items.splice(start, 1);
      }
      removed = true;
      start = this.findBlockStart(marker);
    }
    return removed;
  }

  /** Replaces any block for `marker` with `[marker, ...body]` at end of file. */
  upsertBlock(marker: string, body: readonly string[]): boolean {
    const before = this.serialize();
    this.removeBlock(marker);
    this.appendParagraph([marker, ...body]);
    return this.serialize() !== before;
  }

  /**
   * Inserts `line` into the section introduced by `header` (or one of its
   * `aliases`): after the last line matching `belongs`, else right after the
   * header, else as a new `header` section at end of file.
   */
  appendToSection(
    header: string,
    line: string,
    belongs: (line: ConfigLine) => boolean,
    aliases: readonly string[] = [],
  ): void {
    const parsed = parseLine(line);
    const headers = [header, ...aliases].map((text) => text.trim());
    let anchor = -1;
    this.items.forEach((item, index) => {
      if (belongs(item)) anchor = index;
    });
    if (anchor === -1) {
      anchor = this.items.findIndex((item) => headers.includes(item.raw.trim()));
    }
    if (anchor === -1) {
      this.appendParagraph([header, line]);
      return;
    }
    this.items.splice(anchor + 1, 0, parsed);
  }

  private appendParagraph(lines: readonly string[]): void {
    const last = this.items[this.items.length - 1];
    if (last && last.kind !== "blank") {
      this.items.push(parseLine(""));
    }
    for (const line of lines) {
      this.items.push(parseLine(line));
    }
  }

  private endsInsideBlock(): boolean {
    for (let index = this.items.length - 1; index >= 0; index--) {
      const item = this.items[index];
      if (!item || item.kind === "blank") return false;
      if (item.kind === "marker") return true;
    }
    return false;
  }

  private findBlockStart(marker: string): number {
    const wanted = marker.trim();
    return this.items.findIndex((item) => item.raw.trim() === wanted);
  }

  private blockEnd(start: number): number {
    let end = start + 1;
    while (end < this.items.length) {
      const item = this.items[end];
      if (!item || item.kind === "blank" || item.kind === "marker") break;
      end++;
    }
    return end;
  }
}
