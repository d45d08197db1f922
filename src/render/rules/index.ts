/**
 * Render Rules Index
 * Post-processing steps applied to rendered chapter markup
 */

export { headingAnchors } from "./heading-anchors";
export { removeUnsupported } from "./remove-unsupported";
