import { LatexContentRenderer } from '../../src/services/LatexContentRenderer.js';
import { CitationResolver } from '../../src/services/CitationResolver.js';
import { createNumericStyle } from '../../src/services/CitationStyles.js';
import { BibliographyIndex } from '../../src/managers/BibliographyIndex.js';

describe('LatexContentRenderer', () => {
  let renderer: LatexContentRenderer;

  beforeEach(() => {
    renderer = new LatexContentRenderer();
  });

  describe('renderMarkdown() - inline', () => {
    it('should escape special characters', () => {
      expect(renderer.renderMarkdown('Plain 50% of cases & more')).toBe('Plain 50\\% of cases \\& more');
    });

    it('should convert strong and emphasis', () => {
      expect(renderer.renderMarkdown('**bold** and *italic* and _also_')).toBe(
        '\\textbf{bold} and \\emph{italic} and \\emph{also}'
      );
    });

    it('should keep intraword underscores literal', () => {
      expect(renderer.renderMarkdown('the p_value here')).toBe('the p\\_value here');
    });

    it('should convert code spans', () => {
      expect(renderer.renderMarkdown('Run `a_b{}` now')).toBe('Run \\texttt{a\\_b\\{\\}} now');
    });

    it('should convert links and escape their URLs', () => {
      expect(renderer.renderMarkdown('[site](https://x.org/a%20b)')).toBe('\\href{https://x.org/a\\%20b}{site}');
    });

    it('should pass math through', () => {
      expect(renderer.renderMarkdown('Area $\\pi r^2$ here')).toBe('Area $\\pi r^2$ here');
      expect(renderer.renderMarkdown('$$x_1$$')).toBe('\\[x_1\\]');
    });

    it('should not treat prices as math', () => {
      expect(renderer.renderMarkdown('costs $5 and $10')).toBe('costs \\$5 and \\$10');
    });

    it('should convert superscripts and subscripts', () => {
      expect(renderer.renderMarkdown('H~2~O and x^2^')).toBe('H\\textsubscript{2}O and x\\textsuperscript{2}');
    });

    it('should honour backslash escapes', () => {
      expect(renderer.renderMarkdown('\\*not emphasis\\*')).toBe('*not emphasis*');
    });

    it('should convert hard line breaks', () => {
      expect(renderer.renderMarkdown('line one\\\nline two')).toBe('line one\\\\\nline two');
    });
  });

  describe('renderMarkdown() - blocks', () => {
    it('should keep paragraphs apart', () => {
      expect(renderer.renderMarkdown('First para\nline two\n\nSecond para\n')).toBe('First para\nline two\n\nSecond para');
    });

    it('should convert bullet lists', () => {
      expect(renderer.renderMarkdown('- one\n- two\n')).toBe('\\begin{itemize}\n  \\item one\n  \\item two\n\\end{itemize}');
    });

    it('should convert numbered lists with continuation lines', () => {
      expect(renderer.renderMarkdown('1. first\n   more\n2. second')).toBe(
        '\\begin{enumerate}\n  \\item first\nmore\n  \\item second\n\\end{enumerate}'
      );
    });

    it('should convert pipe tables', () => {
      expect(renderer.renderMarkdown('| A | B |\n|---|--:|\n| 1 | 2 |\n')).toBe(
        ['\\begin{tabular}{lr}', '\\hline', 'A & B \\\\', '\\hline', '1 & 2 \\\\', '\\hline', '\\end{tabular}'].join('\n')
      );
    });

    it('should keep fenced code verbatim', () => {
      expect(renderer.renderMarkdown('```\ncode & stuff\n```\n')).toBe('\\begin{verbatim}\ncode & stuff\n\\end{verbatim}');
    });

    it('should convert block quotes', () => {
      expect(renderer.renderMarkdown('> quoted text')).toBe('\\begin{quote}\nquoted text\n\\end{quote}');
    });

    it('should turn a standalone image into a figure', () => {
      expect(renderer.renderMarkdown('![Flow chart](fig1.png)')).toBe(
        [
          '\\begin{figure}[htbp]',
          '\\centering',
          '\\includegraphics[width=\\linewidth]{fig1.png}',
          '\\caption{Flow chart}',
          '\\end{figure}',
        ].join('\n')
      );
    });

    it('should drop HTML comments', () => {
      expect(renderer.renderMarkdown('Kept<!-- hidden -->\n')).toBe('Kept');
    });
  });

  describe('render()', () => {
    it('should place citation commands without escaping them', () => {
      const built = BibliographyIndex.build('@misc{van_der_berg, title = {T}}');
      if (!built.ok) {
        throw new Error('test bibliography failed to load');
      }
      const resolver = new CitationResolver(built.value, createNumericStyle());
      const { sections } = resolver.resolve([
        {
          kind: 'BodySection',
          heading: 'Results',
          level: 1,
          depth: 2,
          rawContent: 'Rate was 5% [@van_der_berg]; see [@ghost_key].\n',
          order: 0,
        },
      ]);

      expect(renderer.render(sections[0])).toBe(
        'Rate was 5\\% \\cite{van_der_berg}; see \\textbf{[??~\\detokenize{ghost_key}]}.'
      );
    });
  });
});
