/**
 * Assigns unique names within a group by appending numeric suffixes.
 *
 * The file store keys names by (slug, "type.ext") so that `foo.note.md` and
 * `foo.doc.md` never collide with each other.
 */

export class Uniquifier {
  private readonly keys = new Set<string>();

  constructor(
    initial: Iterable<[name: string, group: string]> = [],
    private readonly template = "{name}_{suffix}",
  ) {
    if (!template.includes("{name}") || !template.includes("{suffix}")) {
      throw new Error(
        `Template must contain placeholders for name and suffix: ${template}`,
      );
    }
    for (const [name, group] of initial) {
      this.add(name, group);
    }
  }

  private static key(name: string, group: string): string {
    return `${group}\0${name}`;
  }

  private render(name: string, suffix: number): string {
    return this.template
      .replace("{name}", name)
      .replace("{suffix}", String(suffix));
  }

  /**
   * Like uniquify, but also returns every earlier name taken by the same
   * base name, oldest first.
   */
  uniquifyHistoric(
    name: string,
    group = "",
  ): { name: string; oldNames: string[] } {
    const oldNames: string[] = [];
    if (!this.has(name, group)) {
      this.add(name, group);
      return { name, oldNames };
    }

    oldNames.push(name);
    let suffix = 1;
    while (this.has(this.render(name, suffix), group)) {
      oldNames.push(this.render(name, suffix));
      suffix++;
    }
    const unique = this.render(name, suffix);
    this.add(unique, group);
    return { name: unique, oldNames };
  }

  uniquify(name: string, group = ""): string {
    return this.uniquifyHistoric(name, group).name;
  }

  has(name: string, group = ""): boolean {
    return this.keys.has(Uniquifier.key(name, group));
  }

  add(name: string, group = ""): void {
    this.keys.add(Uniquifier.key(name, group));
  }

  /** Add a name that must not already be taken. */
  addNew(name: string, group = ""): void {
    if (this.has(name, group)) {
      throw new Error(`Name is already in uniquifier: ${name}`);
    }
    this.add(name, group);
  }

  remove(name: string, group = ""): boolean {
    return this.keys.delete(Uniquifier.key(name, group));
  }

  get size(): number {
    return this.keys.size;
  }
}
