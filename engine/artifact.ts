/**
 * Heat Risk Engine — Model Artifact Serialization
 *
 * Binary blob format:
 * [Header (46 bytes)] + [gzip-compressed MsgPack payload]
 *
 * Header layout:
 *   Bytes 0-3:   Magic number (0x48524D41 = "HRMA")
 *   Bytes 4-5:   Schema version (uint16 BE)
 *   Bytes 6-9:   Uncompressed size (uint32 BE)
 *   Bytes 10-41: BLAKE3 of the canonical MsgPack payload — THIS IS THE ARTIFACT ID
 *   Bytes 42-45: Encoding flags (uint32 BE)
 *
 * The ID does not depend on the compression level or zlib build.
 */

import { canonicalMsgPack, decodeMsgPack } from './canonical';
import { compress, decompressWithEncoding, ENCODING_GZIP_MSGPACK } from './compress';
import { hash, toHex, hashesEqual } from './hash';
import { isNumberArray, isRecord } from './guards';
import {
    type RiskModelArtifact,
    type TreeState,
    BLOB_MAGIC,
    CURRENT_SCHEMA_VERSION,
    FEATURE_NAMES
} from './types';

export const BLOB_HEADER_SIZE = 46;

const MIN_SUPPORTED_SCHEMA = 1;
const MAX_SUPPORTED_SCHEMA = CURRENT_SCHEMA_VERSION;

export interface BlobHeader {
    magic: number;
    schemaVersion: number;
    uncompressedSize: number;
    /** Hash of canonical payload bytes — THIS IS THE ARTIFACT ID */
    artifactId: Uint8Array;
    encodingFlags: number;
}

/**
 * Package a model artifact into a content-addressed blob.
 *
 * INVARIANT: Same logical artifact → same hash.
 */
export async function packageArtifact(
    artifact: RiskModelArtifact
): Promise<{ blob: Uint8Array; hash: string }> {
    const payloadBytes = canonicalMsgPack(artifact);

    const artifactId = hash(payloadBytes);
    const compressed = await compress(payloadBytes);

    const header = new Uint8Array(BLOB_HEADER_SIZE);
    const view = new DataView(header.buffer);

    view.setUint32(0, BLOB_MAGIC, false);
    view.setUint16(4, artifact.schemaVersion, false);
    view.setUint32(6, payloadBytes.length, false);
    header.set(artifactId, 10);
    view.setUint32(42, ENCODING_GZIP_MSGPACK, false);

    const blob = new Uint8Array(BLOB_HEADER_SIZE + compressed.length);
    blob.set(header, 0);
    blob.set(compressed, BLOB_HEADER_SIZE);

    return { blob, hash: toHex(artifactId) };
}

/**
 * Unpackage a blob into a model artifact.
 *
 * Enforces schema version bounds, encoding dispatch, the payload hash and the
 * artifact's structure. Any violation throws.
 */
export async function unpackageArtifact(blob: Uint8Array): Promise<RiskModelArtifact> {
    if (blob.length < BLOB_HEADER_SIZE) {
        throw new Error('Blob too small: missing header');
    }

    const header = parseHeader(blob.slice(0, BLOB_HEADER_SIZE));

    if (header.magic !== BLOB_MAGIC) {
        throw new Error(`Invalid magic: expected 0x${BLOB_MAGIC.toString(16)}, got 0x${header.magic.toString(16)}`);
    }
    if (header.schemaVersion < MIN_SUPPORTED_SCHEMA) {
        throw new Error(`Schema version ${header.schemaVersion} is too old (min: ${MIN_SUPPORTED_SCHEMA})`);
    }
    if (header.schemaVersion > MAX_SUPPORTED_SCHEMA) {
        throw new Error(`Schema version ${header.schemaVersion} is unsupported (max: ${MAX_SUPPORTED_SCHEMA})`);
    }

    const payloadBytes = await decompressWithEncoding(blob.slice(BLOB_HEADER_SIZE), header.encodingFlags);

    if (payloadBytes.length !== header.uncompressedSize) {
        throw new Error(`Size mismatch: expected ${header.uncompressedSize}, got ${payloadBytes.length}`);
    }
    if (!hashesEqual(hash(payloadBytes), header.artifactId)) {
        throw new Error('Integrity check failed: artifact ID mismatch');
    }

    const decoded = decodeMsgPack(payloadBytes);
    assertRiskModelArtifact(decoded);
    return decoded;
}

/**
 * Extract artifact ID from blob header without deserializing.
 */
export function getArtifactId(blob: Uint8Array): string {
    if (blob.length < BLOB_HEADER_SIZE) {
        throw new Error('Blob too small');
    }
    return toHex(blob.slice(10, 42));
}

export function computeArtifactId(artifact: RiskModelArtifact): string {
    return toHex(hash(canonicalMsgPack(artifact)));
}

export function parseHeader(headerBytes: Uint8Array): BlobHeader {
    if (headerBytes.length !== BLOB_HEADER_SIZE) {
        throw new Error(`Invalid header size: expected ${BLOB_HEADER_SIZE}`);
    }

    const view = new DataView(headerBytes.buffer, headerBytes.byteOffset, headerBytes.length);

    return {
        magic: view.getUint32(0, false),
        schemaVersion: view.getUint16(4, false),
        uncompressedSize: view.getUint32(6, false),
        artifactId: headerBytes.slice(10, 42),
        encodingFlags: view.getUint32(42, false)
    };
}

// =============================================================================
// Structural Validation
// =============================================================================

/**
 * Throws unless the decoded payload is a risk model this build can score with:
 * same feature order, consistent scaler, and a well-formed scorer snapshot.
 */
export function assertRiskModelArtifact(value: unknown): asserts value is RiskModelArtifact {
    if (!isRecord(value)) throw new Error('Artifact payload is not an object');

    if (value.type !== 'risk_model') {
        throw new Error(`Unexpected artifact type: ${String(value.type)}`);
    }
    if (value.schemaVersion !== CURRENT_SCHEMA_VERSION) {
        throw new Error(`Unexpected artifact schema version: ${String(value.schemaVersion)}`);
    }
    if (
        !Array.isArray(value.featureNames) ||
        value.featureNames.length !== FEATURE_NAMES.length ||
        value.featureNames.some((name, i) => name !== FEATURE_NAMES[i])
    ) {
        throw new Error('Feature order mismatch: artifact was trained on a different feature layout');
    }
    if (typeof value.seed !== 'number' || typeof value.sampleCount !== 'number' || typeof value.trainedAt !== 'string') {
        throw new Error('Artifact metadata is malformed');
    }

    const scaler = value.scaler;
    if (
        !isRecord(scaler) ||
        !isNumberArray(scaler.mean) ||
        !isNumberArray(scaler.scale) ||
        scaler.mean.length !== FEATURE_NAMES.length ||
        scaler.scale.length !== FEATURE_NAMES.length
    ) {
        throw new Error('Scaler state is malformed');
    }

    const scorer = value.scorer;
    if (!isRecord(scorer) || scorer.kind !== 'random_forest') {
        throw new Error(`Unknown scorer kind: ${isRecord(scorer) ? String(scorer.kind) : typeof scorer}`);
    }
    if (
        !isNumberArray(scorer.classes) ||
        typeof scorer.nEstimators !== 'number' ||
        typeof scorer.maxDepth !== 'number' ||
        typeof scorer.maxFeatures !== 'number' ||
        typeof scorer.seed !== 'number' ||
        !Array.isArray(scorer.trees) ||
        !scorer.trees.every(isTreeState)
    ) {
        throw new Error('Scorer state is malformed');
    }
}

function isTreeState(value: unknown): value is TreeState {
    return (
        isRecord(value) &&
        isNumberArray(value.feature) &&
        isNumberArray(value.threshold) &&
        isNumberArray(value.left) &&
        isNumberArray(value.right) &&
        Array.isArray(value.distributions) &&
        value.distributions.every(isNumberArray)
    );
}
