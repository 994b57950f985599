export * from "./lib/cn.js";
export * from "./lib/clamp.js";
export * from "./panel.js";
export * from "./page-header.js";
export * from "./field.js";
export * from "./input.js";
export * from "./number-input.js";
export * from "./select.js";
export * from "./switch.js";
export * from "./button.js";
export * from "./metric-card.js";
export * from "./notice.js";
export * from "./collapsible.js";
