/**
 * Scene graph handed to the rasterizer. Logical units map 1:1 to output
 * pixels; nothing here knows about fonts or image formats.
 */

export interface StatusPalette {
  /** Status -> #RRGGBB */
  colors: Readonly<Record<string, string>>;
  /** Used for statuses missing from `colors` */
  fallback: string;
}

interface Positioned {
  /** Stable element id, unique within one scene */
  id: string;
  x: number;
  y: number;
}

export interface LogoElement extends Positioned {
  kind: 'logo';
  assetId: string;
  width: number;
  height: number;
}

export interface TextElement extends Positioned {
  kind: 'text';
  text: string;
  fontSize: number;
  fontWeight: 'normal' | 'bold';
  color: string;
  align: 'start' | 'middle' | 'end';
}

export interface RectElement extends Positioned {
  kind: 'rect';
  width: number;
  height: number;
  fill: string;
}

/** One status segment of a day's stacked bar */
export interface BarElement extends Positioned {
  kind: 'bar';
  date: string;
  status: string;
  count: number;
  width: number;
  height: number;
  fill: string;
}

export type SceneElement = LogoElement | TextElement | RectElement | BarElement;

export interface SceneGraph {
  readonly canvasWidth: number;
  readonly canvasHeight: number;
  readonly elements: readonly SceneElement[];
}

export interface ComposeOptions {
  statusPalette: StatusPalette;
  /** Named in the chart title, e.g. "Daily Orders (Excluding biteme)" */
  excludedSource: string;
  /**
   * Checklist columns (normalized keys such as "instagram") that make up the
   * overall score. A listed field that is missing, "NA" or anything but true
   * counts as not done. When absent, every boolean template field is scored.
   */
  scoredFields?: readonly string[];
}
