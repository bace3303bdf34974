import type { StyleDocument } from './styleSchema';

const statRow = (caption: string, top: number, icon: string) => ({
  caption,
  icon: { x: 97, y: top + 4, width: 40, height: 40, icon },
  indicator: { x: 320, y: top + 2, width: 44, height: 44 },
  label: {
    x: 147,
    y: top,
    width: 168,
    height: 49,
    font: 'label' as const,
    maxSize: 26,
    minSize: 12,
    align: 'start' as const,
    valign: 'middle' as const,
  },
  value: {
    x: 378,
    y: top + 2,
    width: 216,
    height: 45,
    font: 'bold' as const,
    maxSize: 22,
    minSize: 12,
    align: 'start' as const,
    valign: 'middle' as const,
  },
});

const school = (bgColor: string, fgColor: string, name: string) => ({
  bgColor,
  fgColor,
  icon: `resources/images/${name}/icon.svg`,
});

/**
 * The canonical card template. Geometry is in pixels on an 822x1122 canvas
 * (2.74in x 3.74in at 300dpi).
 */
export const DEFAULT_STYLE: StyleDocument = {
  general: {
    classes: ['Bard', 'Cleric', 'Druid', 'Paladin', 'Ranger', 'Sorcerer', 'Warlock', 'Wizard'],
    fonts: {
      title: 'resources/fonts/DejaVuSerif-Bold.ttf',
      body: 'resources/fonts/DejaVuSerif.ttf',
      bold: 'resources/fonts/DejaVuSans-Bold.ttf',
      label: 'resources/fonts/DejaVuSans.ttf',
    },
    continuationMarker: 'continued',
    outputDirectory: 'output',
  },
  template: {
    canvas: { width: 822, height: 1122 },
    colors: {
      background: '#FFFFFF',
      text: '#000000',
      dim: '#BFBFBF',
      disc: '#000000',
      highlight: '#FFFFFF',
    },
    frame: 'resources/images/template/frame.svg',
    bars: {
      top: { x: 127, y: 75, width: 620, height: 91 },
      middle: { x: 73, y: 516, width: 674, height: 77 },
    },
    schoolIcon: { cx: 127, cy: 127, radius: 57, size: 80 },
    title: {
      x: 201,
      y: 80,
      width: 416,
      height: 82,
      font: 'title',
      maxSize: 44,
      minSize: 16,
      align: 'start',
      valign: 'middle',
    },
    level: {
      x: 617,
      y: 97,
      width: 120,
      height: 48,
      font: 'bold',
      maxSize: 24,
      minSize: 14,
      align: 'end',
      valign: 'middle',
    },
    schoolLine: {
      x: 97,
      y: 530,
      width: 630,
      height: 50,
      font: 'bold',
      maxSize: 30,
      minSize: 14,
      align: 'start',
      valign: 'middle',
    },
    stats: {
      range: statRow('Range', 203, 'resources/images/shared/range.svg'),
      duration: statRow('Duration', 267, 'resources/images/shared/duration.svg'),
      castingTime: statRow('Casting Time', 332, 'resources/images/shared/casting-time.svg'),
    },
    components: {
      x: 97,
      y: 410,
      iconSize: 64,
      gap: 24,
      cost: {
        x: 470,
        y: 418,
        width: 125,
        height: 48,
        font: 'body',
        maxSize: 24,
        minSize: 10,
        align: 'start',
        valign: 'middle',
      },
    },
    classList: {
      x: 602,
      y: 178,
      width: 130,
      height: 334,
      font: 'label',
      maxSize: 24,
      minSize: 10,
      marker: { width: 8, heightRatio: 0.74, offsetRatio: 0.07 },
    },
    body: {
      x: 92,
      y: 610,
      width: 644,
      height: 432,
      font: 'body',
      maxSize: 30,
      minSize: 14,
      align: 'start',
      valign: 'top',
    },
    footer: {
      source: {
        x: 92,
        y: 1050,
        width: 480,
        height: 36,
        font: 'label',
        maxSize: 20,
        minSize: 10,
        align: 'start',
        valign: 'middle',
      },
      page: {
        x: 600,
        y: 1050,
        width: 136,
        height: 36,
        font: 'label',
        maxSize: 20,
        minSize: 10,
        align: 'end',
        valign: 'middle',
      },
    },
    continuation: {
      x: 97,
      y: 203,
      width: 630,
      height: 290,
      font: 'title',
      maxSize: 40,
      minSize: 14,
      align: 'center',
      valign: 'middle',
    },
  },
  school: {
    abjuration: school('#6DC3D3', '#000000', 'abjuration'),
    conjuration: school('#59326C', '#FFFFFF', 'conjuration'),
    divination: school('#D7CB42', '#000000', 'divination'),
    enchantment: school('#B34485', '#FFFFFF', 'enchantment'),
    evocation: school('#377C54', '#FFFFFF', 'evocation'),
    illusion: school('#393F7D', '#FFFFFF', 'illusion'),
    necromancy: school('#804539', '#FFFFFF', 'necromancy'),
    transmutation: school('#7EBF5D', '#000000', 'transmutation'),
  },
  component: {
    verbal: { bgColor: '#E8E2D0', fgColor: '#000000', icon: 'resources/images/shared/verbal.svg' },
    somatic: { bgColor: '#E8E2D0', fgColor: '#000000', icon: 'resources/images/shared/somatic.svg' },
    material: { bgColor: '#E8E2D0', fgColor: '#000000', icon: 'resources/images/shared/material.svg' },
  },
  indicator: {
    ritual: { bgColor: '#FFFFFF', fgColor: '#000000', icon: 'resources/images/shared/ritual.svg' },
    concentration: { bgColor: '#FFFFFF', fgColor: '#000000', icon: 'resources/images/shared/concentration.svg' },
  },
};
