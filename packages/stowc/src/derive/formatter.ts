import { Strategy, type Hint } from "#hints";
import { formatKey } from "#keys";
import { Type } from "#types";

import type { Derived } from "./derived.js";

export class Formatter {
  private output: string[] = [];
  private indent = 0;

  format(derived: readonly Derived[]): string {
    this.output = [];
    this.indent = 0;

    this.line("=== Storage Layout ===");
    this.line("");

    for (const entry of derived) {
      this.formatEntry(entry);
      this.line("");
    }

    return this.output.join("\n").trimEnd();
  }

  private formatEntry(derived: Derived) {
    this.line(`${derived.name} (${derived.packedness}) @ ${formatKey(derived.key)}`);
    this.indent++;

    const type = derived.type;
    if (Type.isStruct(type)) {
      for (const hint of derived.hints) {
        this.formatHint(hint);
      }
    } else {
      for (const variant of type.variants) {
        this.line(`${variant.name}#${variant.discriminant}:`);
        this.indent++;
        for (const hint of derived.hints) {
          if (hint.variant?.name === variant.name) {
            this.formatHint(hint);
          }
        }
        this.indent--;
      }
    }

    this.indent--;
  }

  private formatHint(hint: Hint) {
    const strategy = hint.strategy;
    const placement = Strategy.isInline(strategy)
      ? `inline #${strategy.position}${strategy.offset !== undefined ? ` @ +${strategy.offset}` : ""}`
      : `cell ${formatKey(strategy.key)}${strategy.manual ? " (manual)" : ""}`;

    this.line(`${hint.field.name}: ${hint.field.type.toString()}  ${placement}`);
  }

  private line(text: string) {
    const indentStr = "  ".repeat(this.indent);
    this.output.push(text ? indentStr + text : "");
  }
}

export function formatDerived(derived: readonly Derived[]): string {
  return new Formatter().format(derived);
}
