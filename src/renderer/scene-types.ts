// Types for the structured scene tree

export type AttrValue = string | number | undefined;

export interface SvgElement {
  tag: string;
  attrs: Record<string, AttrValue>;
  children: SvgElement[];
}

export type Declaration = readonly [property: string, value: string];

export interface StyleRule {
  selector: string;
  declarations: Declaration[];
}

export interface Keyframe {
  /** Percentage of the cycle, 0 to 100 */
  offset: number;
  declarations: Declaration[];
}

export interface KeyframesRule {
  name: string;
  frames: Keyframe[];
}

export interface StyleSheet {
  rules: StyleRule[];
  keyframes: KeyframesRule[];
}

export interface SceneDocument {
  width: number;
  height: number;
  /** Every id the defs block defines, after suffixing */
  ids: string[];
  defs: SvgElement[];
  style: StyleSheet;
  body: SvgElement[];
}
