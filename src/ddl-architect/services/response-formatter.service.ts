import { Injectable } from '@nestjs/common';
import { DependencyResolverService } from './dependency-resolver.service';

const CODE_BLOCK_PATTERN = /```(sql|json|markdown)\n([\s\S]*?)```/gi;

/**
 * Post-processes a Markdown answer: every fenced `sql` block goes through the
 * resolver, everything else is kept byte for byte.
 */
@Injectable()
export class ResponseFormatterService {
  constructor(private readonly resolver: DependencyResolverService) {}

  format(text: string): string {
    return text.replace(CODE_BLOCK_PATTERN, (block, language: string, content: string) => {
      const body = content.trim();
      if (language.toLowerCase() !== 'sql' || body.length === 0) {
        return block;
      }
      return '```' + language + '\n' + this.resolver.resolve(body) + '\n```';
    });
  }
}
