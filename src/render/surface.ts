import type { SurfaceConfig } from '../config.js';
import type { EditorDocument, EditorHost, Surface, Viewport } from '../editor/types.js';
import { cleanProse, stripFences } from './sanitize.js';

export type ResponseFormat = 'prose' | 'code';

export const EMPTY_PLACEHOLDER = '(no output)';

export interface SurfaceGeometry {
  width: number;
  height: number;
  row: number;
  col: number;
}

export function computeGeometry(viewport: Viewport, contentLines: number, cfg: SurfaceConfig): SurfaceGeometry {
  const width = Math.max(1, Math.min(Math.floor(viewport.columns * cfg.width_ratio), cfg.max_width));
  const height = Math.max(
    1,
    Math.min(Math.floor(viewport.lines * cfg.height_ratio), cfg.max_height, contentLines + cfg.margin),
  );
  return {
    width,
    height,
    row: Math.max(0, Math.floor((viewport.lines - height) / 2)),
    col: Math.max(0, Math.floor((viewport.columns - width) / 2)),
  };
}

/**
 * Prose is cleaned of markdown and loses its blank lines. Code only loses its
 * wrapping fence and the blank lines around it.
 */
export function toDisplayLines(text: string, format: ResponseFormat): string[] {
  let lines: string[];
  if (format === 'prose') {
    lines = cleanProse(text).split('\n').filter((line) => line.trim() !== '');
  } else {
    lines = stripFences(text).split('\n');
    while (lines.length > 0 && (lines[0] ?? '').trim() === '') lines.shift();
    while (lines.length > 0 && (lines[lines.length - 1] ?? '').trim() === '') lines.pop();
  }
  return lines.length > 0 ? lines : [EMPTY_PLACEHOLDER];
}

export interface RenderRequest {
  text: string;
  title: string;
  language: string;
  format: ResponseFormat;
  /** The surface closes when this document does. */
  owner?: EditorDocument;
}

export class ResponseRenderer {
  constructor(
    private readonly host: EditorHost,
    private readonly cfg: SurfaceConfig,
  ) {}

  render(req: RenderRequest): Surface {
    const lines = toDisplayLines(req.text, req.format);
    const geometry = computeGeometry(this.host.viewport(), lines.length, this.cfg);

    const surface = this.host.openSurface({
      ...geometry,
      border: 'rounded',
      title: ` ${req.title} `,
      titlePos: 'center',
      language: req.language,
      wrap: true,
      linebreak: true,
      cursorline: true,
    });
    surface.setLines(lines);

    const ownerSubscription = req.owner?.onDidClose(() => safeClose());
    function safeClose(): void {
      ownerSubscription?.dispose();
      if (surface.isValid()) {
        surface.close();
      }
    }

    for (const key of this.cfg.close_keys) {
      surface.mapKey(key, safeClose);
    }
    surface.mapKey('<C-d>', () => {
      surface.scrollHalfPage('down');
      surface.recenter();
    });
    surface.mapKey('<C-u>', () => {
      surface.scrollHalfPage('up');
      surface.recenter();
    });

    return surface;
  }
}
