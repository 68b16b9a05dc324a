import { FixerOutput, StrategyFixer } from './strategies.js';

function changed(original: string, content: string, addedImports: string[] = [], removedImports: string[] = []): FixerOutput | null {
  if (content === original) {
    return null;
  }

  return { content, addedImports, removedImports };
}

/** Adds `import` lines that are not present yet, after the last import or the package line. */
export function ensureImports(content: string, imports: readonly string[]): string {
  const missing = imports.filter((name) => !new RegExp(`^import\\s+${name.replace(/\./g, '\\.')}\\s*;`, 'm').test(content));
  if (missing.length === 0) {
    return content;
  }

  const block = missing.map((name) => `import ${name};`).join('\n');
  const importLines = [...content.matchAll(/^import\s+[\w.*]+\s*;[ \t]*$/gm)];
  const lastImport = importLines[importLines.length - 1];

  if (lastImport?.index !== undefined) {
    const end = lastImport.index + lastImport[0].length;
    return `${content.slice(0, end)}\n${block}${content.slice(end)}`;
  }

  const packageLine = /^package\s+[\w.]+\s*;[ \t]*$/m.exec(content);
  if (packageLine) {
    const end = packageLine.index + packageLine[0].length;
    return `${content.slice(0, end)}\n\n${block}${content.slice(end)}`;
  }

  return `${block}\n\n${content}`;
}

function className(content: string): string {
  return /public\s+(?:final\s+|abstract\s+)*class\s+(\w+)/.exec(content)?.[1] ?? 'UnknownClass';
}

export const javaUtilLogging: StrategyFixer = (content) => {
  let next = content.replace('import java.util.logging.Logger;', 'import org.slf4j.Logger;\nimport org.slf4j.LoggerFactory;');
  next = next.replace(/java\.util\.logging\.Logger\.getGlobal\(\)/g, 'LoggerFactory.getLogger(getClass())');
  next = next.replace(
    /private\s+java\.util\.logging\.Logger\s+(\w+);/g,
    `private static final Logger $1 = LoggerFactory.getLogger(${className(content)}.class);`
  );
  next = next.replace(/java\.util\.logging\.Logger/g, 'Logger');

  return changed(content, next, ['org.slf4j.Logger', 'org.slf4j.LoggerFactory'], ['java.util.logging.Logger']);
};

export const secureRandom: StrategyFixer = (content) => {
  let next = content.replace('import java.util.Random;', 'import java.security.SecureRandom;');
  next = next.replace(/\bnew\s+Random\s*\(/g, 'new SecureRandom(');
  next = next.replace(/(?<![\w.])Random\s+(\w+)\s*=/g, 'SecureRandom $1 =');

  return changed(content, next, ['java.security.SecureRandom'], ['java.util.Random']);
};

export const serialVersionUid: StrategyFixer = (content) => {
  const next = content.replace(
    /(?:(?:public|private|protected)\s+)?(?:static\s+)?(?:final\s+)?(?:int|long)\s+serialVersionUID\s*=\s*(\d+)L?\s*;/,
    'private static final long serialVersionUID = $1L;'
  );

  return changed(content, next);
};

export const transactionalLayer: StrategyFixer = (content) => {
  let next = content.replace(/^[ \t]*@Transactional(?:\([^)]*\))?[ \t]*\r?\n/gm, '');

  if (!next.includes('@Transactional')) {
    next = next.replace(/^import\s+org\.springframework\.transaction\.annotation\.Transactional;[ \t]*\r?\n/m, '');
  }

  return changed(content, next, [], ['org.springframework.transaction.annotation.Transactional']);
};

export const stdStreams: StrategyFixer = (content) => {
  let next = content
    .replace(/System\.out\.println\((.*?)\);/g, 'logger.info($1);')
    .replace(/System\.err\.println\((.*?)\);/g, 'logger.error($1);');

  if (next === content) {
    return null;
  }

  if (!/private\s+static\s+final\s+Logger\s+logger\b/.test(next)) {
    const declaration = /(public\s+(?:final\s+|abstract\s+)*class\s+\w+[^{]*\{)/.exec(next);
    if (declaration) {
      const field = `\n    private static final Logger logger = LoggerFactory.getLogger(${className(content)}.class);\n`;
      const end = declaration.index + declaration[0].length;
      next = `${next.slice(0, end)}${field}${next.slice(end)}`;
    }
  }

  const imports = ['org.slf4j.Logger', 'org.slf4j.LoggerFactory'];
  return changed(content, ensureImports(next, imports), imports);
};
