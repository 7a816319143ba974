/**
 * Integration tests for the assembly pipeline
 *
 * Runs converted manuscripts through bibliography loading, splitting,
 * citation resolution and merging into an article template.
 */

import { assemble } from '../../src/index.js';
import type { AssemblyInput, AssemblyResult } from '../../src/index.js';

const BIBLIOGRAPHY = `@article{smith2020,
  author = {Smith, John},
  title = {Sleep},
  journal = {J Sleep},
  year = 2020
}

@article{wilson2019,
  author = {Wilson, Ann},
  title = {Recovery},
  year = 2019
}
`;

const TEMPLATE_SOURCE = [
  '\\documentclass{article}',
  '\\title{{{SECTION:title}}}',
  '\\begin{document}',
  '\\maketitle',
  '\\begin{abstract}',
  '{{SECTION:abstract}}',
  '\\end{abstract}',
  '{{SECTION:body}}',
  '{{BIBLIOGRAPHY}}',
  '\\end{document}',
  '',
].join('\n');

const DECLARATION = {
  name: 'article',
  placeholders: [
    { name: 'title', kind: 'Title' },
    { name: 'abstract', kind: 'Abstract', required: true },
    { name: 'body', kind: 'BodySection', repeat: true, required: true },
  ],
};

function run(markdown: string): AssemblyResult {
  const input: AssemblyInput = {
    markdown,
    bibliographySource: BIBLIOGRAPHY,
    template: { source: TEMPLATE_SOURCE, declaration: DECLARATION },
  };
  const result = assemble(input);
  if (!result.ok) {
    throw new Error(`assembly failed at ${result.error.stage}`);
  }
  return result.value;
}

describe('assemble() integration', () => {
  it('should assemble a complete article', () => {
    const result = run(
      [
        '# Sleep and Recovery',
        '',
        '## Abstract',
        'Short summary.',
        '',
        '## Methods',
        'We enrolled 40 adults [@smith2020].',
        '',
        '## Results',
        'Recovery improved [@smith2020, p. 4].',
        '',
      ].join('\n')
    );

    expect(result.finalDocument).toBe(
      [
        '\\documentclass{article}',
        '\\title{Sleep and Recovery}',
        '\\begin{document}',
        '\\maketitle',
        '\\begin{abstract}',
        'Short summary.',
        '\\end{abstract}',
        '\\section{Methods}',
        '',
        'We enrolled 40 adults \\cite{smith2020}.',
        '',
        '\\section{Results}',
        '',
        'Recovery improved \\cite[p. 4]{smith2020}.',
        '\\begin{thebibliography}{9}',
        '\\bibitem{smith2020} Smith J. Sleep. J Sleep. 2020.',
        '\\end{thebibliography}',
        '\\end{document}',
        '',
      ].join('\n')
    );
    expect(result.warnings).toEqual([]);
    expect(result.citedKeys).toEqual(['smith2020']);
  });

  it('should replace a resolvable marker with a citation command', () => {
    const result = run('## Abstract\nA.\n\n## Introduction\nBackground text [@smith2020].\n');

    expect(result.finalDocument).toContain('\\section{Introduction}\n\nBackground text \\cite{smith2020}.\n');
    expect(result.unresolvedCitations.size).toBe(0);
  });

  it('should flag a whole group when one of its keys is missing', () => {
    const result = run('## Abstract\nA.\n\n## Discussion\nAs shown [@wilson2019; @unknownkey].\n');

    expect(result.finalDocument).toContain(
      '\\section{Discussion}\n\nAs shown \\textbf{[??~\\detokenize{wilson2019; unknownkey}]}.\n'
    );
    expect([...result.unresolvedCitations]).toEqual(['unknownkey']);
    expect(result.citedKeys).toEqual([]);
    expect(result.warnings).toEqual([
      'Citation key "unknownkey" not found in bibliography (1 occurrence)',
      '1 unresolved citation key(s): unknownkey',
    ]);
  });

  it('should leave a missing required abstract empty and warn', () => {
    const result = run('## Introduction\nI.\n');

    expect(result.finalDocument).toContain('\\begin{abstract}\n\n\\end{abstract}');
    expect(result.emptyPlaceholders).toEqual(['title', 'abstract']);
    expect(result.warnings).toEqual(['Required placeholder "abstract" missing: no matching Abstract section']);
  });

  it('should place several body sections in source order in one placeholder', () => {
    const result = run('## Abstract\nA.\n\n## Methods\nFirst.\n\n## Results\nSecond.\n');

    expect(result.finalDocument).toContain('\\section{Methods}\n\nFirst.\n\n\\section{Results}\n\nSecond.\n');
    expect(result.sectionsUsed.find(fill => fill.placeholder === 'body')?.sections.map(section => section.heading)).toEqual([
      'Methods',
      'Results',
    ]);
  });
});
