import TurndownService from 'turndown';

export interface MarkdownConverter {
  toMarkdown(html: string): string;
}

export class TurndownMarkdownConverter implements MarkdownConverter {
  private readonly service: TurndownService;

  constructor() {
    this.service = new TurndownService({
      headingStyle: 'atx',
      codeBlockStyle: 'fenced',
      bulletListMarker: '-',
    });
    this.service.remove(['script', 'style', 'noscript']);
  }

  toMarkdown(html: string): string {
    if (html.trim().length === 0) return '';
    return this.service.turndown(html).trim();
  }
}
