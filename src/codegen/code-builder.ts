/**
 * CodeBuilder - simple string builder with indentation support.
 *
 * Builds Python source with a given indentation unit and line separator.
 */

export class CodeBuilder {
  private parts: string[] = [];
  private indentLevel: number = 0;
  private indentStr: string;
  private newlineStr: string;
  private atLineStart: boolean = true;

  constructor(indentStr: string = "    ", newlineStr: string = "\n") {
    this.indentStr = indentStr;
    this.newlineStr = newlineStr;
  }

  /**
   * Add content to the builder.
   * Handles indentation when at the start of a line.
   */
  write(content: string): this {
    if (content.length === 0) return this;

    // Content may contain line breaks; each becomes the configured separator
    const lines = content.split(/\r\n|\r|\n/);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (i > 0) {
        this.newline();
      }
      if (line.length > 0) {
        if (this.atLineStart) {
          this.parts.push(this.indentStr.repeat(this.indentLevel));
          this.atLineStart = false;
        }
        this.parts.push(line);
      }
    }
    return this;
  }

  /**
   * Add a line separator.
   */
  newline(): this {
    this.parts.push(this.newlineStr);
    this.atLineStart = true;
    return this;
  }

  /**
   * Add content followed by a line separator.
   */
  writeLine(content: string = ""): this {
    this.write(content);
    return this.newline();
  }

  /**
   * Increase indentation level.
   */
  indent(): this {
    this.indentLevel++;
    return this;
  }

  /**
   * Decrease indentation level.
   */
  dedent(): this {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
    return this;
  }

  /**
   * Build the final string.
   */
  build(): string {
    return this.parts.join("");
  }
}
