/**
 * SSH Config Service
 * Reads and rewrites the SSH client configuration as an ordered list of
 * host blocks. Directives sshm does not model are carried through verbatim.
 */

import fs from 'fs-extra';
import { ConflictError, NotFoundError, ParseError, isNodeError, toSshmError } from '../errors.js';
import { writeFileAtomic } from '../utils/atomic.js';
import { logger } from '../utils/logger.js';
import type {
  ConfigHostBlock,
  HostBlockFields,
  SshConfigDocument,
  UpsertOutcome,
} from '../types/index.js';

const INDENT = '  ';

// "Keyword value" or "Keyword=value"
const DIRECTIVE_PATTERN = /^(\S+?)(?:\s*=\s*|\s+)(.*)$/;

export function emptyDocument(): SshConfigDocument {
  return { preamble: [], blocks: [] };
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1);
  }
  return value;
}

function quoteIfNeeded(value: string): string {
  return /\s/.test(value) ? `"${value}"` : value;
}

/**
 * Parse SSH config text. Blank lines inside blocks are padding and are not
 * kept; comments directly above a `Host` line travel with that block.
 */
export function parseSshConfig(content: string, source = 'ssh config'): SshConfigDocument {
  const doc = emptyDocument();
  const seen = new Set<string>();
  let current: ConfigHostBlock | null = null;
  let pending: string[] = [];

  const flush = () => {
    if (current) {
      current.extraLines.push(...pending);
    } else {
      doc.preamble.push(...pending);
    }
    pending = [];
  };

  const lines = content.split(/\r?\n/);
  // A trailing newline yields one empty string that is not a line of its own
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  lines.forEach((line, index) => {
    const lineNo = index + 1;
    const trimmed = line.trim();

    if (trimmed === '') {
      flush();
      if (!current) {
        doc.preamble.push('');
      }
      return;
    }

    if (trimmed.startsWith('#')) {
      pending.push(line);
      return;
    }

    const match = trimmed.match(DIRECTIVE_PATTERN);
    if (!match || match[2].trim() === '') {
      throw new ParseError(source, 'Unterminated directive: keyword without a value', line, lineNo);
    }

    const keyword = match[1];
    const value = match[2].trim();
    if ((value.match(/"/g)?.length ?? 0) % 2 !== 0) {
      throw new ParseError(source, 'Unterminated quoted value', line, lineNo);
    }

    const key = keyword.toLowerCase();

    if (key === 'host' || key === 'match') {
      if (key === 'host') {
        if (seen.has(value)) {
          throw new ParseError(source, `Duplicate Host alias "${value}"`, line, lineNo);
        }
        seen.add(value);
      }
      const block: ConfigHostBlock = {
        alias: value,
        keyword: key === 'host' ? 'Host' : 'Match',
        extraLines: [],
      };
      if (pending.length > 0) {
        block.comments = pending;
        pending = [];
      }
      doc.blocks.push(block);
      current = block;
      return;
    }

    flush();

    if (!current) {
      doc.preamble.push(line);
      return;
    }

    if (key === 'hostname' && current.hostname === undefined) {
      current.hostname = unquote(value);
    } else if (key === 'user' && current.user === undefined) {
      current.user = unquote(value);
    } else if (key === 'identityfile' && current.identityFile === undefined) {
      current.identityFile = unquote(value);
    } else {
      current.extraLines.push(line);
    }
  });

  flush();
  return doc;
}

function serializeBlock(block: ConfigHostBlock): string[] {
  const lines = [...(block.comments ?? []), `${block.keyword} ${block.alias}`];
  if (block.hostname !== undefined) lines.push(`${INDENT}HostName ${quoteIfNeeded(block.hostname)}`);
  if (block.user !== undefined) lines.push(`${INDENT}User ${quoteIfNeeded(block.user)}`);
  if (block.identityFile !== undefined) lines.push(`${INDENT}IdentityFile ${quoteIfNeeded(block.identityFile)}`);
  lines.push(...block.extraLines);
  return lines;
}

/** Emit the document; every block is followed by exactly one blank line */
export function serializeSshConfig(doc: SshConfigDocument): string {
  const out: string[] = [];

  const preamble = [...doc.preamble];
  while (preamble.length > 0 && preamble[preamble.length - 1].trim() === '') {
    preamble.pop();
  }
  if (preamble.length > 0) {
    out.push(...preamble, '');
  }

  for (const block of doc.blocks) {
    out.push(...serializeBlock(block), '');
  }

  return out.map(line => line + '\n').join('');
}

export function findBlock(doc: SshConfigDocument, alias: string): ConfigHostBlock | undefined {
  return doc.blocks.find(b => b.keyword === 'Host' && b.alias === alias);
}

function sameBlock(a: ConfigHostBlock, b: ConfigHostBlock): boolean {
  return serializeBlock(a).join('\n') === serializeBlock(b).join('\n');
}

function directiveKeyword(line: string): string | undefined {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return undefined;
  }
  return trimmed.match(DIRECTIVE_PATTERN)?.[1].toLowerCase();
}

function applyFields(block: ConfigHostBlock, fields: HostBlockFields): ConfigHostBlock {
  const extraLines = [...block.extraLines];
  for (const line of fields.extraLines ?? []) {
    const keyword = directiveKeyword(line);
    if (!extraLines.some(existing => keyword !== undefined && directiveKeyword(existing) === keyword)) {
      extraLines.push(line);
    }
  }
  return {
    ...block,
    hostname: fields.hostname ?? block.hostname,
    user: fields.user ?? block.user,
    identityFile: fields.identityFile ?? block.identityFile,
    extraLines,
  };
}

/** Insert a block, or replace the fields of the block with the same alias in place */
export function upsertBlock(
  doc: SshConfigDocument,
  alias: string,
  fields: HostBlockFields
): { doc: SshConfigDocument; outcome: UpsertOutcome } {
  const index = doc.blocks.findIndex(b => b.keyword === 'Host' && b.alias === alias);

  if (index === -1) {
    const block = applyFields({ alias, keyword: 'Host', extraLines: [] }, fields);
    return { doc: { ...doc, blocks: [...doc.blocks, block] }, outcome: 'created' };
  }

  const existing = doc.blocks[index];
  const updated = applyFields(existing, fields);
  if (sameBlock(existing, updated)) {
    return { doc, outcome: 'unchanged' };
  }

  const blocks = [...doc.blocks];
  blocks[index] = updated;
  return { doc: { ...doc, blocks }, outcome: 'updated' };
}

export function removeBlock(
  doc: SshConfigDocument,
  alias: string
): { doc: SshConfigDocument; removed: boolean } {
  const blocks = doc.blocks.filter(b => !(b.keyword === 'Host' && b.alias === alias));
  if (blocks.length === doc.blocks.length) {
    return { doc, removed: false };
  }
  return { doc: { ...doc, blocks }, removed: true };
}

/** Give a block a new alias (and optionally new fields) at its current position */
export function renameBlock(
  doc: SshConfigDocument,
  oldAlias: string,
  newAlias: string,
  fields: HostBlockFields = {}
): SshConfigDocument {
  const index = doc.blocks.findIndex(b => b.keyword === 'Host' && b.alias === oldAlias);
  if (index === -1) {
    throw new NotFoundError(oldAlias, `Host alias not found: ${oldAlias}`);
  }
  if (newAlias !== oldAlias && findBlock(doc, newAlias)) {
    throw new ConflictError(newAlias, `Host alias already exists: ${newAlias}`);
  }

  const blocks = [...doc.blocks];
  blocks[index] = applyFields({ ...blocks[index], alias: newAlias }, fields);
  return { ...doc, blocks };
}

/**
 * File-backed block store. Each mutation is one load-modify-write cycle and
 * the write replaces the file atomically, so a failed edit leaves it as it was.
 */
export class ConfigBlockStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<SshConfigDocument> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error, 'ENOENT')) {
        return emptyDocument();
      }
      throw toSshmError(error, this.filePath);
    }
    return parseSshConfig(content, this.filePath);
  }

  async list(): Promise<ConfigHostBlock[]> {
    const doc = await this.load();
    return doc.blocks;
  }

  async get(alias: string): Promise<ConfigHostBlock | undefined> {
    return findBlock(await this.load(), alias);
  }

  /**
   * Apply a pure edit to the document and persist it. Nothing is written when
   * the serialized text does not change.
   */
  async edit<T>(mutate: (doc: SshConfigDocument) => { doc: SshConfigDocument; result: T }): Promise<T> {
    const before = await this.load();
    const { doc, result } = mutate(before);

    const previous = serializeSshConfig(before);
    const next = serializeSshConfig(doc);
    if (next !== previous) {
      try {
        await writeFileAtomic(this.filePath, next, { mode: 0o600 });
      } catch (error) {
        throw toSshmError(error, this.filePath);
      }
      logger.debug(`Rewrote ${this.filePath} (${doc.blocks.length} block(s))`);
    }
    return result;
  }

  async upsert(alias: string, fields: HostBlockFields): Promise<UpsertOutcome> {
    return this.edit(doc => {
      const { doc: updated, outcome } = upsertBlock(doc, alias, fields);
      return { doc: updated, result: outcome };
    });
  }

  async remove(alias: string): Promise<boolean> {
    return this.edit(doc => {
      const { doc: updated, removed } = removeBlock(doc, alias);
      return { doc: updated, result: removed };
    });
  }

  async rename(oldAlias: string, newAlias: string, fields: HostBlockFields = {}): Promise<void> {
    await this.edit(doc => ({ doc: renameBlock(doc, oldAlias, newAlias, fields), result: undefined }));
  }
}
