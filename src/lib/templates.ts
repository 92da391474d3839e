import Handlebars from "handlebars";
import { TemplateArityError } from "./errors";
import { LAYOUT } from "./paths";

export interface XmlNode {
  name: string;
  attrs?: Record<string, string>;
  children?: Array<XmlNode | string>;
}

export type Slot = "version" | "identifier" | "generator";

/**
 * Order in which slot values are supplied. Every template's `slots` is a
 * subsequence of this list, and callers pass values in exactly this order.
 */
export const SLOT_ORDER: readonly Slot[] = ["version", "identifier", "generator"];

export interface ArchiveTemplate {
  name: string;
  slots: readonly Slot[];
  doctype?: string;
  root: XmlNode;
}

// ─────────────────────────────────────────────────────────────
// Bootstrap templates
// ─────────────────────────────────────────────────────────────

export const CONTAINER_TEMPLATE: ArchiveTemplate = {
  name: "container.xml",
  slots: [],
  root: {
    name: "container",
    attrs: { version: "1.0", xmlns: "urn:oasis:names:tc:opendocument:xmlns:container" },
    children: [
      {
        name: "rootfiles",
        children: [
          {
            name: "rootfile",
            attrs: {
              "full-path": LAYOUT.manifest,
              "media-type": "application/oebps-package+xml",
            },
          },
        ],
      },
    ],
  },
};

export const MANIFEST_TEMPLATE: ArchiveTemplate = {
  name: "content.opf",
  slots: ["version", "identifier", "generator"],
  root: {
    name: "package",
    attrs: {
      xmlns: "http://www.idpf.org/2007/opf",
      version: "{{version}}",
      "unique-identifier": "bookid",
    },
    children: [
      {
        name: "metadata",
        attrs: {
          "xmlns:dc": "http://purl.org/dc/elements/1.1/",
          "xmlns:opf": "http://www.idpf.org/2007/opf",
        },
        children: [
          { name: "dc:title" },
          { name: "dc:identifier", attrs: { id: "bookid" }, children: ["{{identifier}}"] },
          { name: "meta", attrs: { name: "generator", content: "{{generator}}" } },
        ],
      },
      { name: "manifest" },
      { name: "spine" },
    ],
  },
};

export const NAVIGATION_TEMPLATE: ArchiveTemplate = {
  name: "toc.ncx",
  slots: ["identifier"],
  doctype:
    '<!DOCTYPE ncx PUBLIC "-//NISO//DTD ncx 2005-1//EN" "http://www.daisy.org/z3986/2005/ncx-2005-1.dtd">',
  root: {
    name: "ncx",
    attrs: { xmlns: "http://www.daisy.org/z3986/2005/ncx/", version: "2005-1" },
    children: [
      {
        name: "head",
        children: [
          { name: "meta", attrs: { name: "dtb:uid", content: "{{identifier}}" } },
          { name: "meta", attrs: { name: "dtb:depth", content: "0" } },
          { name: "meta", attrs: { name: "dtb:totalPageCount", content: "0" } },
          { name: "meta", attrs: { name: "dtb:maxPageNumber", content: "0" } },
        ],
      },
      { name: "docTitle", children: [{ name: "text" }] },
      { name: "navMap" },
    ],
  },
};

// ─────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────

const compiled = new Map<ArchiveTemplate, ReturnType<typeof Handlebars.compile>>();

/**
 * Render a template, filling its slots positionally.
 * `values` must have exactly one entry per slot, in SLOT_ORDER order.
 */
export function renderTemplate(template: ArchiveTemplate, values: readonly string[]): string {
  if (values.length !== template.slots.length) {
    throw new TemplateArityError(template.name, template.slots.length, values.length);
  }

  let render = compiled.get(template);
  if (!render) {
    render = Handlebars.compile(serializeDocument(template), { strict: true });
    compiled.set(template, render);
  }

  const context: Record<string, string> = {};
  template.slots.forEach((slot, i) => {
    context[slot] = values[i];
  });

  return render(context);
}

/**
 * Serialize a template tree to XML text, slot markers left in place.
 */
export function serializeDocument(template: ArchiveTemplate): string {
  const lines = ['<?xml version="1.0" encoding="UTF-8"?>'];
  if (template.doctype) {
    lines.push(template.doctype);
  }
  serializeNode(template.root, 0, lines);
  return lines.join("\n") + "\n";
}

function serializeNode(node: XmlNode, depth: number, lines: string[]): void {
  const indent = "  ".repeat(depth);
  const attrs = Object.entries(node.attrs ?? {})
    .map(([key, value]) => ` ${key}="${escapeXml(value)}"`)
    .join("");
  const children = node.children ?? [];

  if (children.length === 0) {
    lines.push(`${indent}<${node.name}${attrs}/>`);
    return;
  }

  if (children.every((child) => typeof child === "string")) {
    const text = children.map((child) => escapeXml(String(child))).join("");
    lines.push(`${indent}<${node.name}${attrs}>${text}</${node.name}>`);
    return;
  }

  lines.push(`${indent}<${node.name}${attrs}>`);
  for (const child of children) {
    if (typeof child === "string") {
      lines.push(`${indent}  ${escapeXml(child)}`);
    } else {
      serializeNode(child, depth + 1, lines);
    }
  }
  lines.push(`${indent}</${node.name}>`);
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
