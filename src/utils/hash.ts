/**
 * Digest Utilities for Fixity Verification
 *
 * Computes MD5, SHA-1, SHA-256 and SHA-512 digests as lowercase hex strings,
 * and the 'sha256:'-prefixed fingerprints used as cache keys for serialized
 * packages.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';
import { DIGEST_HEX_LENGTH, type FixityAlgorithm } from '../models/fixity.js';

/**
 * Hash prefix used for package fingerprints
 */
const HASH_PREFIX = 'sha256:';

/**
 * Matches 'sha256:' followed by exactly 64 lowercase hex characters
 */
const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

const HEX_PATTERN = /^[0-9a-fA-F]+$/;

/** Read size for chunked file hashing */
const CHUNK_SIZE = 65536;

const NODE_ALGORITHM: Record<FixityAlgorithm, string> = {
  MD5: 'md5',
  'SHA-1': 'sha1',
  'SHA-256': 'sha256',
  'SHA-512': 'sha512',
};

/**
 * Compute a SHA-256 fingerprint of content
 *
 * @returns 'sha256:' + 64-char lowercase hex string
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');
  return HASH_PREFIX + hash;
}

/**
 * Validate fingerprint format ('sha256:' + 64 lowercase hex chars)
 */
export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}

/**
 * Compute a digest of in-memory content
 *
 * @example
 * computeDigest('abc', 'MD5')
 * // Returns: '900150983cd24fb0d6963f7d28e17f72'
 */
export function computeDigest(content: string | Buffer, algorithm: FixityAlgorithm): string {
  return crypto.createHash(NODE_ALGORITHM[algorithm]).update(content).digest('hex');
}

/**
 * Compute several digests of a file in one pass, reading 64KB chunks
 * synchronously.
 *
 * @param filePath - Path to the file to hash
 * @param algorithms - Algorithms to compute; duplicates are computed once
 * @returns Lowercase hex digest per requested algorithm
 * @throws NodeJS.ErrnoException if the file cannot be opened or read
 */
export function computeFileDigestsSync(
  filePath: string,
  algorithms: readonly FixityAlgorithm[]
): Map<FixityAlgorithm, string> {
  const hashes = new Map<FixityAlgorithm, crypto.Hash>();
  for (const algorithm of algorithms) {
    if (!hashes.has(algorithm)) {
      hashes.set(algorithm, crypto.createHash(NODE_ALGORITHM[algorithm]));
    }
  }

  const fd = fs.openSync(filePath, 'r');
  try {
    const buffer = Buffer.allocUnsafe(CHUNK_SIZE);
    let bytesRead: number;
    while ((bytesRead = fs.readSync(fd, buffer, 0, CHUNK_SIZE, null)) > 0) {
      const chunk = bytesRead === CHUNK_SIZE ? buffer : buffer.subarray(0, bytesRead);
      for (const hash of hashes.values()) {
        hash.update(chunk);
      }
    }
  } finally {
    fs.closeSync(fd);
  }

  const digests = new Map<FixityAlgorithm, string>();
  for (const [algorithm, hash] of hashes) {
    digests.set(algorithm, hash.digest('hex'));
  }
  return digests;
}

/**
 * Check that a digest is hex (either case) of the algorithm's length
 *
 * @example
 * isValidDigestFormat('900150983cd24fb0d6963f7d28e17f72', 'MD5') // true
 * isValidDigestFormat('900150983CD24FB0D6963F7D28E17F72', 'MD5') // true
 * isValidDigestFormat('900150983cd24fb0', 'MD5')                 // false
 */
export function isValidDigestFormat(digest: string, algorithm: FixityAlgorithm): boolean {
  return digest.length === DIGEST_HEX_LENGTH[algorithm] && HEX_PATTERN.test(digest);
}
