import type { TagAttributes } from "vitetags-shared";
import { InvalidTagAttributeError } from "./errors.js";

/** A complete HTML element, as text. */
export type Tag = string;

// Anything but whitespace, quotes, ">", "/", "=" and control characters.
const ATTRIBUTE_NAME = /^[^\s"'>\/=\p{Cc}]+$/u;

export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/**
 * Overlay caller attributes on a tag's defaults. A key keeps the position it
 * first appeared at; the caller's value wins.
 */
export function mergeAttributes(
  defaults: TagAttributes,
  overrides: TagAttributes = {},
): TagAttributes {
  return { ...defaults, ...overrides };
}

/**
 * Render attributes as ` name="value"` pairs, each with a leading space.
 * `true` renders a bare attribute and `false` omits it.
 */
export function renderAttributes(attrs: TagAttributes): string {
  let out = "";
  for (const [name, value] of Object.entries(attrs)) {
    if (!ATTRIBUTE_NAME.test(name)) throw new InvalidTagAttributeError(name);
    if (value === false) continue;
    out += value === true ? ` ${name}` : ` ${name}="${escapeAttribute(value)}"`;
  }
  return out;
}

export function script(src: string, attrs: TagAttributes = {}): Tag {
  return `<script${renderAttributes(attrs)} src="${escapeAttribute(src)}"></script>`;
}

export function stylesheet(href: string): Tag {
  return `<link rel="stylesheet" href="${escapeAttribute(href)}" />`;
}

export function stylesheetPreload(href: string): Tag {
  return `<link rel="preload" as="style" href="${escapeAttribute(href)}" />`;
}

export function preload(href: string, attrs: TagAttributes = {}): Tag {
  return `<link${renderAttributes(attrs)} href="${escapeAttribute(href)}" />`;
}

/**
 * Inline module script that installs the React refresh runtime served by
 * @vitejs/plugin-react. It must run before any React component module.
 */
export function reactRefreshPreamble(url: string, attrs: TagAttributes = {}): Tag {
  const specifier = JSON.stringify(url).replace(/</g, "\\u003c");
  return [
    `<script${renderAttributes(attrs)}>`,
    `  import RefreshRuntime from ${specifier}`,
    "  RefreshRuntime.injectIntoGlobalHook(window)",
    "  window.$RefreshReg$ = () => {}",
    "  window.$RefreshSig$ = () => (type) => type",
    "  window.__vite_plugin_react_preamble_installed__ = true",
    "</script>",
  ].join("\n");
}
