/**
 * Output of each compilation target, as text or JSON
 */

import { Descriptor, TypeExpression, type Program } from "#descriptor";
import { formatDerived, type Derived } from "#derive";
import { FieldPath, formatKey } from "#keys";
import type { Layout, LayoutMetadata } from "#layout";
import { Type, type Declarations } from "#types";

import type { OutputFormat } from "./options.js";

/**
 * JSON with bigints as decimal strings and maps as objects
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => {
      if (typeof item === "bigint") {
        return item.toString();
      }
      if (item instanceof Map) {
        return Object.fromEntries(item);
      }
      return item;
    },
    2,
  );
}

export function formatProgram(program: Program, format: OutputFormat): string {
  if (format === "json") {
    return formatJson({
      root: program.root ?? null,
      rootKey: program.rootKey ?? null,
      types: program.types.map((descriptor) =>
        Descriptor.isStruct(descriptor)
          ? {
              kind: descriptor.tuple ? "tuple" : "struct",
              name: descriptor.name,
              fields: descriptor.fields.map(fieldSummary),
            }
          : {
              kind: "enum",
              name: descriptor.name,
              variants: descriptor.variants.map((variant) => ({
                name: variant.name,
                discriminant: variant.discriminant,
                fields: variant.fields.map(fieldSummary),
              })),
            },
      ),
    });
  }

  const lines: string[] = [];
  for (const descriptor of program.types) {
    if (Descriptor.isStruct(descriptor)) {
      lines.push(`${descriptor.tuple ? "tuple" : "struct"} ${descriptor.name}`);
      lines.push(...descriptor.fields.map((field) => `  ${fieldLine(field)}`));
    } else {
      lines.push(`enum ${descriptor.name}`);
      for (const variant of descriptor.variants) {
        lines.push(`  ${variant.name}#${variant.discriminant}`);
        lines.push(...variant.fields.map((field) => `    ${fieldLine(field)}`));
      }
    }
  }
  return lines.join("\n");
}

export function formatDeclarations(
  declarations: Declarations,
  format: OutputFormat,
): string {
  const types = [...declarations.values()];

  if (format === "json") {
    return formatJson(
      types.map((type) =>
        Type.isStruct(type)
          ? {
              kind: "struct",
              name: type.name,
              fields: type.fields.map(typeFieldSummary),
            }
          : {
              kind: "enum",
              name: type.name,
              variants: type.variants.map((variant) => ({
                name: variant.name,
                discriminant: variant.discriminant,
                fields: variant.fields.map(typeFieldSummary),
              })),
            },
      ),
    );
  }

  const lines: string[] = [];
  for (const type of types) {
    if (Type.isStruct(type)) {
      lines.push(`struct ${type.name}`);
      lines.push(...type.fields.map((field) => `  ${typeFieldLine(field)}`));
    } else {
      lines.push(`enum ${type.name}`);
      for (const variant of type.variants) {
        lines.push(`  ${variant.name}#${variant.discriminant}`);
        lines.push(...variant.fields.map((field) => `    ${typeFieldLine(field)}`));
      }
    }
  }
  return lines.join("\n");
}

export function formatDerivedTypes(
  derived: readonly Derived[],
  format: OutputFormat,
): string {
  if (format === "text") {
    return formatDerived(derived);
  }

  return formatJson(
    derived.map((entry) => ({
      name: entry.name,
      packedness: entry.packedness,
      key: formatKey(entry.key),
      hints: entry.hints.map((hint) => ({
        field: hint.label,
        path: FieldPath.format(hint.path),
        type: hint.field.type.toString(),
        packedness: hint.packedness,
        strategy:
          hint.strategy.kind === "cell"
            ? { ...hint.strategy, key: formatKey(hint.strategy.key) }
            : hint.strategy,
      })),
    })),
  );
}

export function formatLayouts(
  layouts: ReadonlyMap<string, LayoutMetadata>,
  format: OutputFormat,
): string {
  if (format === "json") {
    return formatJson(layouts);
  }

  const sections: string[] = [];
  for (const [name, metadata] of layouts) {
    const names = new Map(metadata.types.map(({ id, type }) => [id, type]));
    const lines = [name];
    renderLayout(metadata.layout, names, 1, lines);
    sections.push(lines.join("\n"));
  }
  return sections.join("\n\n");
}

function renderLayout(
  layout: Layout,
  types: ReadonlyMap<number, string>,
  depth: number,
  lines: string[],
  label = "",
): void {
  const indent = "  ".repeat(depth);

  if ("root" in layout) {
    lines.push(`${indent}${label}root ${layout.root.rootKey}`);
    renderLayout(layout.root.layout, types, depth + 1, lines);
    return;
  }
  if ("cell" in layout) {
    const type = types.get(layout.cell.ty) ?? `#${layout.cell.ty}`;
    lines.push(`${indent}${label}cell ${layout.cell.key} (${type})`);
    return;
  }
  if ("hash" in layout) {
    const { offset, strategy } = layout.hash;
    lines.push(
      `${indent}${label}hash ${offset} ${strategy.hasher} prefix ${strategy.prefix}`,
    );
    renderLayout(layout.hash.layout, types, depth + 1, lines);
    return;
  }
  if ("struct" in layout) {
    lines.push(`${indent}${label}struct ${layout.struct.name}`);
    renderFields(layout.struct.fields, types, depth + 1, lines);
    return;
  }

  lines.push(
    `${indent}${label}enum ${layout.enum.name} dispatch ${layout.enum.dispatchKey}`,
  );
  for (const [discriminant, variant] of Object.entries(layout.enum.variants)) {
    lines.push(`${indent}  ${variant.name}#${discriminant}`);
    renderFields(variant.fields, types, depth + 2, lines);
  }
}

function renderFields(
  fields: readonly Layout.Field[],
  types: ReadonlyMap<number, string>,
  depth: number,
  lines: string[],
): void {
  fields.forEach((field, index) => {
    renderLayout(field.layout, types, depth, lines, `${field.name ?? index}: `);
  });
}

function fieldSummary(field: Descriptor.Field) {
  return {
    name: field.name,
    type: TypeExpression.format(field.type),
    key: field.key ?? null,
  };
}

function fieldLine(field: Descriptor.Field): string {
  const key = field.key !== undefined ? ` @ ${formatKey(field.key)}` : "";
  return `${field.name}: ${TypeExpression.format(field.type)}${key}`;
}

function typeFieldSummary(field: Type.Field) {
  return {
    name: field.name,
    type: field.type.toString(),
    key: field.key ?? null,
  };
}

function typeFieldLine(field: Type.Field): string {
  const key = field.key !== undefined ? ` @ ${formatKey(field.key)}` : "";
  return `${field.name}: ${field.type.toString()}${key}`;
}
