import { createStyleScope, postProcessArtifact } from '../../src';

// Two-panel figure for a REVTeX manuscript: wide layout, Latin Modern fonts,
// and an explicit host override for the font family.
const scope = createStyleScope({
  'figstyle.doc': 'aps',
  'figstyle.tex': true,
  'figstyle.tex.font': 'lmodern',
  'figstyle.wide': true,
  'font.family': 'serif',
});

console.log('figure size (in):', scope.options['figure.figsize']);
console.log('preamble:', scope.options['text.latex.preamble']);
console.log('minor ticks per major:', scope.host.minorTicksPerMajor);

async function finish(path: string) {
  // The host writes `path` using `scope.options`; tidy the file afterwards.
  const report = await postProcessArtifact(path, { crop: true, optimize: true });
  if (!report.processed) {
    console.log(`${path} was not rendered, nothing to post-process`);
    return;
  }
  for (const warning of report.warnings) console.log('skipped:', warning.tool);
}

finish(process.argv[2] ?? 'journal-figure.pdf').catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
