import { TextOverflowError, UnknownCategoryValueError } from '../../errors';
import { logger } from '../../logger';
import type { ImageResource, ResourceCache } from '../resources/resourceCache';
import { describeLevelAndSchool, levelLabel, type SpellRecord } from '../records/spellRecord';
import {
  lookupCategory,
  type Box,
  type CategoryEntry,
  type FontRole,
  type StyleConfig,
  type TextBox,
} from '../style/styleConfig';
import type { FontFace } from '../text/fontFace';
import { paginate } from '../text/paginator';
import { fitText, type FittedText, type Fitter } from '../text/textFitter';

export interface RectLayer {
  kind: 'rect';
  box: Box;
  fill: string;
}

export interface CircleLayer {
  kind: 'circle';
  cx: number;
  cy: number;
  radius: number;
  fill: string;
}

export interface ImageLayer {
  kind: 'image';
  box: Box;
  image: ImageResource;
}

export interface TextLayer {
  kind: 'text';
  field: string;
  box: Box;
  fill: string;
  fit: FittedText;
  /** SVG path data of every line, already positioned on the canvas. */
  path: string;
}

export type CardLayer = RectLayer | CircleLayer | ImageLayer | TextLayer;

export interface SidebarEntry {
  name: string;
  highlighted: boolean;
}

export interface CardPage {
  index: number;
  total: number;
  width: number;
  height: number;
  background: string;
  continued: boolean;
  layers: CardLayer[];
  /** Empty on continuation pages, which show the marker instead. */
  sidebar: SidebarEntry[];
  bodyText: string;
  body: FittedText;
}

export interface ComposedCard {
  name: string;
  pages: CardPage[];
}

interface BodyChunk {
  text: string;
  fit: FittedText;
}

/**
 * Turns one spell record into the draw layers of every page of its card.
 * Synchronous and free of output side effects; the only state it touches is
 * the resource cache.
 */
export class CardCompositor {
  constructor(
    private readonly config: StyleConfig,
    private readonly resources: ResourceCache
  ) {}

  compose(record: SpellRecord): ComposedCard {
    const { template } = this.config;
    const school = lookupCategory(this.config.school, 'school', record.school);
    const components = record.components.map((name) => ({
      name,
      entry: lookupCategory(this.config.component, 'component', name),
    }));
    const sidebar = this.sidebarEntries(record);

    const header = this.headerLayers(record, school);
    const chunks = this.layoutBody(record.description);
    const total = chunks.length;

    const pages = chunks.map((chunk, index): CardPage => {
      const continued = index > 0;
      const layers: CardLayer[] = [...header];
      if (continued) {
        layers.push(this.textLayer('continuation', this.config.general.continuationMarker, template.continuation, template.colors.text));
      } else {
        layers.push(...this.statLayers(record));
        layers.push(...this.componentLayers(record, components));
        layers.push(...this.sidebarLayers(sidebar, school));
      }
      layers.push(this.placeText('description', chunk.fit, template.body, template.colors.text));
      layers.push(...this.footerLayers(record, index, total));

      return {
        index,
        total,
        width: template.canvas.width,
        height: template.canvas.height,
        background: template.colors.background,
        continued,
        layers,
        sidebar: continued ? [] : sidebar,
        bodyText: chunk.text,
        body: chunk.fit,
      };
    });

    logger.debug(`[Cards] Composed ${record.name}: ${pages.length} page(s)`);
    return { name: record.name, pages };
  }

  private face(role: FontRole): FontFace {
    return this.resources.font(this.config.general.fonts[role]);
  }

  private image(logicalPath: string, box: Box): ImageLayer {
    return { kind: 'image', box, image: this.resources.image(logicalPath) };
  }

  private fit(field: string, text: string, box: TextBox): FittedText {
    try {
      return fitText(text, box, this.face(box.font), box.maxSize, box.minSize);
    } catch (error) {
      if (error instanceof TextOverflowError) throw error.withField(field);
      throw error;
    }
  }

  private textLayer(field: string, text: string, box: TextBox, fill: string): TextLayer {
    return this.placeText(field, this.fit(field, text, box), box, fill);
  }

  private placeText(field: string, fit: FittedText, box: TextBox, fill: string): TextLayer {
    const face = this.face(box.font);
    const top = box.valign === 'middle' ? box.y + (box.height - fit.height) / 2 : box.y;
    const ascent = face.ascent(fit.fontSize);
    const path = fit.lines
      .map((line, index) => {
        if (!line) return '';
        const width = face.measure(line, fit.fontSize);
        const x =
          box.align === 'end'
            ? box.x + box.width - width
            : box.align === 'center'
              ? box.x + (box.width - width) / 2
              : box.x;
        return face.outline(line, x, top + index * fit.lineHeight + ascent, fit.fontSize);
      })
      .filter((segment) => segment.length > 0)
      .join('');
    return { kind: 'text', field, box, fill, fit, path };
  }

  private layoutBody(description: string): BodyChunk[] {
    const box = this.config.template.body;
    const fitter: Fitter = (text, target) => fitText(text, target, this.face(box.font), box.maxSize, box.minSize);
    try {
      return [{ text: description, fit: fitter(description, box) }];
    } catch (error) {
      if (!(error instanceof TextOverflowError)) throw error;
    }
    try {
      return paginate(description, box, fitter);
    } catch (error) {
      if (error instanceof TextOverflowError) throw error.withField('description');
      throw error;
    }
  }

  private headerLayers(record: SpellRecord, school: CategoryEntry): CardLayer[] {
    const { template } = this.config;
    const { canvas, bars, schoolIcon } = template;
    const iconBox: Box = {
      x: schoolIcon.cx - schoolIcon.size / 2,
      y: schoolIcon.cy - schoolIcon.size / 2,
      width: schoolIcon.size,
      height: schoolIcon.size,
    };
    return [
      this.image(template.frame, { x: 0, y: 0, width: canvas.width, height: canvas.height }),
      { kind: 'rect', box: bars.top, fill: school.bgColor },
      { kind: 'rect', box: bars.middle, fill: school.bgColor },
      { kind: 'circle', cx: schoolIcon.cx, cy: schoolIcon.cy, radius: schoolIcon.radius, fill: template.colors.disc },
      this.image(school.icon, iconBox),
      this.textLayer('name', record.name, template.title, school.fgColor),
      this.textLayer('level', levelLabel(record.level), template.level, school.fgColor),
      this.textLayer('school', describeLevelAndSchool(record), template.schoolLine, school.fgColor),
    ];
  }

  private statLayers(record: SpellRecord): CardLayer[] {
    const { template, indicator } = this.config;
    const rows = [
      { field: 'castingTime', row: template.stats.castingTime, value: record.castingTime, overlay: record.ritual ? indicator.ritual : undefined },
      { field: 'range', row: template.stats.range, value: record.range, overlay: undefined },
      { field: 'duration', row: template.stats.duration, value: record.duration, overlay: record.concentration ? indicator.concentration : undefined },
    ];

    const layers: CardLayer[] = [];
    for (const { field, row, value, overlay } of rows) {
      layers.push(this.image(row.icon.icon, row.icon));
      layers.push(this.textLayer(`${field}Label`, row.caption, row.label, template.colors.text));
      layers.push(this.textLayer(field, value, row.value, template.colors.text));
      if (overlay) {
        const { indicator: box } = row;
        layers.push({
          kind: 'circle',
          cx: box.x + box.width / 2,
          cy: box.y + box.height / 2,
          radius: Math.min(box.width, box.height) / 2,
          fill: overlay.bgColor,
        });
        layers.push(this.image(overlay.icon, box));
      }
    }
    return layers;
  }

  private componentLayers(record: SpellRecord, components: { name: string; entry: CategoryEntry }[]): CardLayer[] {
    const { template } = this.config;
    const { x, y, iconSize, gap, cost } = template.components;
    const layers: CardLayer[] = [];
    components.forEach(({ entry }, index) => {
      const box: Box = { x: x + index * (iconSize + gap), y, width: iconSize, height: iconSize };
      layers.push({ kind: 'rect', box, fill: entry.bgColor });
      layers.push(this.image(entry.icon, box));
    });

    if (record.materialCost) {
      const material = components.find(({ name }) => name.toLowerCase() === 'material');
      const text = `${record.materialCost}${record.materialConsumed ? '*' : ''}`;
      layers.push(this.textLayer('materialCost', text, cost, material?.entry.fgColor ?? template.colors.text));
    }
    return layers;
  }

  private sidebarEntries(record: SpellRecord): SidebarEntry[] {
    const configured = this.config.general.classes;
    const known = new Set(configured.map((name) => name.toLowerCase()));
    const wanted = new Set<string>();
    for (const name of record.classes) {
      const key = name.toLowerCase();
      if (!known.has(key)) {
        throw new UnknownCategoryValueError('class', name);
      }
      wanted.add(key);
    }
    return configured.map((name) => ({ name, highlighted: wanted.has(name.toLowerCase()) }));
  }

  private sidebarLayers(entries: SidebarEntry[], school: CategoryEntry): CardLayer[] {
    const { template } = this.config;
    const { classList, bars } = template;
    const rowHeight = Math.floor(classList.height / entries.length);
    const markerX = bars.top.x + bars.top.width - classList.marker.width;

    const layers: CardLayer[] = [];
    entries.forEach((entry, index) => {
      const row: TextBox = {
        x: classList.x,
        y: classList.y + rowHeight * index,
        width: classList.width,
        height: rowHeight,
        font: classList.font,
        maxSize: classList.maxSize,
        minSize: classList.minSize,
        align: 'end',
        valign: 'middle',
      };
      if (!entry.highlighted) {
        layers.push(this.textLayer('classes', entry.name, row, template.colors.dim));
        return;
      }
      layers.push({ kind: 'rect', box: row, fill: template.colors.highlight });
      layers.push(this.textLayer('classes', entry.name, row, school.bgColor));
      layers.push({
        kind: 'rect',
        box: {
          x: markerX,
          y: row.y + rowHeight * classList.marker.offsetRatio,
          width: classList.marker.width,
          height: rowHeight * classList.marker.heightRatio,
        },
        fill: school.bgColor,
      });
    });
    return layers;
  }

  private footerLayers(record: SpellRecord, index: number, total: number): CardLayer[] {
    const { template } = this.config;
    const layers: CardLayer[] = [];
    if (record.source) {
      layers.push(this.textLayer('source', record.source, template.footer.source, template.colors.dim));
    }
    if (total > 1) {
      layers.push(this.textLayer('page', `${index + 1} / ${total}`, template.footer.page, template.colors.dim));
    }
    return layers;
  }
}
