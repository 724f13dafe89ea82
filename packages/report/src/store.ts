import * as path from 'node:path';
import { collectArtifacts, type ArtifactStore } from '@matrix-ci/core';

export interface DirectoryArtifactStoreOptions {
    /** Directory that destinations resolve against */
    root: string;
}

/**
 * Artifact store backed by a local (or mounted) directory.
 * Each persist replaces the destination's previous contents.
 */
export class DirectoryArtifactStore implements ArtifactStore {
    constructor(private readonly options: DirectoryArtifactStoreOptions) {}

    async persist(artifactDir: string, destination: string): Promise<string[]> {
        const target = path.resolve(this.options.root, destination);
        return collectArtifacts(artifactDir, target, { clean: true });
    }
}
