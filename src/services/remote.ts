/**
 * Remote URL Service
 * Takes git remote URLs apart and puts them back together with a different
 * host, so a repository can be pointed at an SSH config alias.
 */

import { DEFAULT_GIT_USER, DEFAULT_HOST, PLATFORM_HOSTS } from '../constants.js';
import { ParseError } from '../errors.js';
import type { RemoteBinding, RemoteScheme } from '../types/index.js';

// ssh://[user@]host[:port]/path, http(s)://[user@]host[:port]/path
const URL_PATTERN = /^(ssh|https?):\/\/(?:([^@/]+)@)?([^/:@]+)(?::(\d+))?\/(.*)$/i;

// [user@]host:path
const SCP_PATTERN = /^(?:([^@/:\s]+)@)?([^@/:\s]+):(.*)$/;

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

function splitRepoPath(url: string, repoPath: string): Pick<RemoteBinding, 'owner' | 'repo' | 'gitSuffix'> {
  const gitSuffix = repoPath.endsWith('.git');
  const trimmed = gitSuffix ? repoPath.slice(0, -'.git'.length) : repoPath;
  const segments = trimmed.split('/');

  if (segments.length < 2 || segments.some(s => s.trim() === '')) {
    throw new ParseError(url, 'Remote URL must name an owner and a repository', repoPath || url);
  }

  const repo = segments[segments.length - 1];
  const owner = segments.slice(0, -1).join('/');
  return { owner, repo, gitSuffix };
}

function toScheme(value: string): RemoteScheme {
  const lower = value.toLowerCase();
  if (lower === 'ssh' || lower === 'https' || lower === 'http') {
    return lower;
  }
  return 'https';
}

/**
 * Parse an scp-like (`git@host:owner/repo.git`), `ssh://` or `http(s)://`
 * remote. Anything else, or a path without owner and repository, is a
 * ParseError; there is no partial result.
 */
export function parseRemoteUrl(url: string): RemoteBinding {
  const input = url.trim();
  const schemeMatch = input.match(SCHEME_PATTERN);

  if (schemeMatch) {
    const match = input.match(URL_PATTERN);
    if (!match) {
      const scheme = schemeMatch[1].toLowerCase();
      const supported = scheme === 'ssh' || scheme === 'https' || scheme === 'http';
      throw new ParseError(
        input,
        supported ? 'Malformed remote URL' : `Unsupported remote URL scheme "${scheme}"`,
        input
      );
    }
    const [, scheme, user, host, port, repoPath] = match;
    return {
      scheme: toScheme(scheme),
      host,
      user,
      port: port ? Number(port) : undefined,
      ...splitRepoPath(input, repoPath),
    };
  }

  const scp = input.match(SCP_PATTERN);
  if (!scp) {
    throw new ParseError(input, 'Unsupported remote URL', input);
  }
  const [, user, host, repoPath] = scp;
  if (repoPath.startsWith('/')) {
    throw new ParseError(input, 'Remote URL must name an owner and a repository', repoPath);
  }
  return { scheme: 'scp', host, user, ...splitRepoPath(input, repoPath) };
}

/**
 * Rebuild the URL with `alias` as its host. Scheme, user, port and the
 * `.git` suffix are kept, so `buildAliasUrl(parseRemoteUrl(u), host)`
 * returns `u` for any supported `u`.
 */
export function buildAliasUrl(binding: RemoteBinding, alias: string): string {
  const repoPath = `${binding.owner}/${binding.repo}${binding.gitSuffix ? '.git' : ''}`;
  const userPart = binding.user ? `${binding.user}@` : '';

  if (binding.scheme === 'scp') {
    return `${userPart}${alias}:${repoPath}`;
  }

  const portPart = binding.port !== undefined ? `:${binding.port}` : '';
  return `${binding.scheme}://${userPart}${alias}${portPart}/${repoPath}`;
}

/**
 * URL that reaches the repository through an SSH alias. SSH forms only swap
 * the host; HTTP(S) forms become the scp-like SSH form.
 */
export function toSshAliasUrl(binding: RemoteBinding, alias: string): string {
  if (binding.scheme === 'scp' || binding.scheme === 'ssh') {
    return buildAliasUrl(binding, alias);
  }
  return `${DEFAULT_GIT_USER}@${alias}:${binding.owner}/${binding.repo}.git`;
}

/** `github.com` + `work` -> `github-work` */
export function deriveAlias(hostname: string, tag: string): string {
  return `${hostname.split('.')[0]}-${tag}`;
}

/** Platform host suggested by a tag name, e.g. `gitlab-acme` -> `gitlab.com` */
export function inferHostname(tag: string, fallback: string = DEFAULT_HOST): string {
  const lower = tag.toLowerCase();
  for (const [platform, host] of PLATFORM_HOSTS) {
    if (lower.includes(platform)) {
      return host;
    }
  }
  return fallback;
}
