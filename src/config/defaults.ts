import type { HostDefaults, StyleFragment } from './types';

/**
 * Namespace shared by every intent key and registry fragment.
 */
export const STYLE_NAMESPACE = 'figstyle';

/**
 * Sub-namespace merged whenever its family is referenced.
 */
export const COMMON_SUFFIX = 'common';

/**
 * Request keys that steer resolution instead of being merged as option data.
 */
export const metaKeys = {
  typeset: 'figstyle.tex',
  wide: 'figstyle.wide',
  square: 'figstyle.square',
  preamble: 'figstyle.tex.preamble',
} as const;

export type MetaKey = (typeof metaKeys)[keyof typeof metaKeys];

/** Host option holding the figure size tuple (inches). */
export const SIZE_OPTION = 'figure.figsize';
/** Alternate size used by wide layouts; never reaches the host. */
export const WIDE_SIZE_OPTION = 'figure.widefigsize';
export const PREAMBLE_OPTION = 'text.latex.preamble';
/** Fragment merged when typesetting is switched on. */
export const TYPESET_FRAGMENT = 'figstyle.tex';

/**
 * Option names that may only appear inside fragments.
 */
export const weedKeys = [WIDE_SIZE_OPTION] as const;

// Hosts take dimensions in inches: 72 pt = 1 in.
const pt = 1 / 72;
const golden = 1.618033;

/**
 * Built-in fragments, keyed by dotted name.
 *
 * Parameter choices follow the usual journal templates: REVTeX (`aps`),
 * Proceedings A (`rspa`) and the standard LaTeX classes (`standard`).
 */
export const defaultFragments = {
  'figstyle.doc.common': {
    'axes.linewidth': 0.5,
    'axes.titlepad': 10,
    'font.family': 'sans-serif',
    'font.sans-serif': ['Helvetica', 'Arial', 'sans-serif'],
    'grid.color': '#cccccc',
    'grid.linestyle': '--',
    'grid.linewidth': 0.5,
    'legend.fontsize': 9.0,
    'legend.frameon': false,
    'lines.linewidth': 0.75,
    'lines.markersize': 1.5,
    'contour.linewidth': 0.75,
    'mathtext.fontset': 'stixsans',
    'savefig.dpi': 600,
    'xtick.major.width': 0.5,
    'xtick.minor.visible': true,
    'xtick.minor.width': 0.5,
    'ytick.major.width': 0.5,
    'ytick.minor.visible': true,
    'ytick.minor.width': 0.5,
    'scatter.edgecolors': 'none',
  },

  'figstyle.doc.aps': {
    'figure.figsize': [246 * pt, (246 / golden) * pt],
    'figure.widefigsize': [505 * pt, 246 * 0.75 * pt],
    'font.size': 8.0,
    'legend.fontsize': 7.5,
    'legend.handlelength': 1.45,
    'legend.labelspacing': 0.2,
    'legend.numpoints': 1,
    'legend.scatterpoints': 1,
  },

  'figstyle.doc.rspa': {
    'figure.figsize': [400 * 0.5 * pt, ((400 * 0.5) / golden) * pt],
    'font.size': 8.0,
    'legend.fontsize': 7.5,
    'legend.handlelength': 1.45,
    'legend.labelspacing': 0.2,
    'legend.numpoints': 1,
    'legend.scatterpoints': 1,
  },

  'figstyle.doc.standard': {
    'figure.figsize': [260 * pt, (260 / golden) * pt],
    'figure.widefigsize': [315 * pt, (315 / golden) * pt],
    'font.size': 8.0,
  },

  // Hosts load LaTeX packages matching the configured sans and serif fonts,
  // which clash with the packages each preamble below pulls in.
  'figstyle.tex.font.common': {
    'font.sans-serif': '',
    'font.serif': '',
  },
  'figstyle.tex.font.lmodern': {
    'text.latex.preamble': '\\usepackage{amsfonts,amssymb,bm,lmodern}',
    'font.family': 'serif',
  },
  'figstyle.tex.font.cmbright': {
    'text.latex.preamble': '\\usepackage{amsfonts,amssymb,bm,cmbright}',
  },
  'figstyle.tex.font.fourier': {
    'text.latex.preamble': '\\usepackage{fourierx}\n\\usepackage[sans]{fammath}\n',
  },
  'figstyle.tex.font.mathtime': {
    'text.latex.preamble': '\\usepackage{mathtime}\n\\usepackage[sans]{fammath}\n',
  },
  'figstyle.tex.font.newtx': {
    'text.latex.preamble': '\\usepackage[newtx]{mathtime}\n\\usepackage[sans]{fammath}\n',
  },
  'figstyle.tex.font.sansmath': {
    'text.latex.preamble': '\\usepackage{lmodern,amsfonts,amssymb,bm}\n\\usepackage[sans]{fammath}\n',
  },

  'figstyle.tex': {
    'text.usetex': true,
  },
} as const satisfies Readonly<Record<string, StyleFragment>>;

/**
 * Host-side tweaks handed to the rendering layer alongside resolved options.
 * Hosts default to five minor ticks between majors when none are requested.
 */
export const hostDefaults = {
  minorTicksPerMajor: 4,
} as const satisfies HostDefaults;
