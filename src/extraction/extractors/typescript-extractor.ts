/**
 * AST-based extractor for TypeScript and JavaScript sources.
 *
 * Parses with the TypeScript compiler API (no type checking, no program)
 * and walks the tree for declarations. The parser is error-tolerant, so
 * malformed input still yields whatever declarations it can recover.
 */

import ts from 'typescript';
import type { CodeEntity, SourceLanguage } from '../../types/consistency.js';
import {
  EntityCollector,
  type EntityExtractor,
  type ExtractionOptions,
} from '../entity-extractor.js';

export class TypeScriptEntityExtractor implements EntityExtractor {
  readonly language: SourceLanguage = 'typescript';

  constructor(private readonly options: ExtractionOptions = {}) {}

  extract(code: string, origin?: string): CodeEntity[] {
    const collector = new EntityCollector(origin, this.options);
    if (!code.trim()) {
      return collector.toArray();
    }

    const fileName = origin ?? 'input.ts';
    const sourceFile = ts.createSourceFile(
      fileName,
      code,
      ts.ScriptTarget.Latest,
      true,
      scriptKindFor(fileName)
    );

    const lineOf = (node: ts.Node): number =>
      sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line + 1;

    function visit(node: ts.Node): void {
      if (ts.isFunctionDeclaration(node) && node.name) {
        collector.add(node.name.text, 'function', lineOf(node));
      } else if (ts.isVariableDeclaration(node) && ts.isIdentifier(node.name) && node.initializer) {
        if (ts.isArrowFunction(node.initializer) || ts.isFunctionExpression(node.initializer)) {
          collector.add(node.name.text, 'function', lineOf(node));
        }
      } else if ((ts.isClassDeclaration(node) || ts.isClassExpression(node)) && node.name) {
        collector.add(node.name.text, 'class', lineOf(node));
      } else if (ts.isInterfaceDeclaration(node)) {
        collector.add(node.name.text, 'class', lineOf(node));
      } else if (ts.isMethodDeclaration(node) || ts.isMethodSignature(node)) {
        const name = memberName(node.name);
        if (name) {
          collector.add(name, 'method', lineOf(node));
        }
      } else if (ts.isPropertyDeclaration(node) && node.initializer) {
        const name = memberName(node.name);
        if (
          name &&
          (ts.isArrowFunction(node.initializer) || ts.isFunctionExpression(node.initializer))
        ) {
          collector.add(name, 'method', lineOf(node));
        }
      } else if (ts.isPropertyAssignment(node) || ts.isShorthandPropertyAssignment(node)) {
        const name = memberName(node.name);
        if (name) {
          collector.add(name, 'config-key', lineOf(node));
        }
      }

      ts.forEachChild(node, visit);
    }

    visit(sourceFile);
    return collector.toArray();
  }
}

function memberName(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isPrivateIdentifier(name)) {
    return name.text.replace(/^#/, '');
  }
  return undefined;
}

function scriptKindFor(fileName: string): ts.ScriptKind {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.tsx')) return ts.ScriptKind.TSX;
  if (lower.endsWith('.jsx')) return ts.ScriptKind.JSX;
  if (lower.endsWith('.js') || lower.endsWith('.mjs') || lower.endsWith('.cjs')) {
    return ts.ScriptKind.JS;
  }
  return ts.ScriptKind.TS;
}
