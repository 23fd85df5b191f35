import type { Community, CommunityAssignment } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Holds the published community mapping.
 *
 * `publish()` installs a new immutable version with a single reference swap,
 * so readers see either the previous mapping or the new one, never a mix.
 */
export class CommunityRegistry {
    private currentVersion: CommunityAssignment | null = null;
    private nextVersion = 1;

    /**
     * Freeze and install a detection result; returns it with its assigned version.
     */
    publish(result: CommunityAssignment): CommunityAssignment {
        const published: CommunityAssignment = Object.freeze({
            version: this.nextVersion++,
            createdAt: result.createdAt,
            assignment: new Map(result.assignment),
            communities: Object.freeze(result.communities.map((community) => Object.freeze({ ...community }))),
            modularity: result.modularity,
        });

        this.currentVersion = published;
        logger.info(
            { version: published.version, communities: published.communities.length },
            'Community mapping published'
        );
        return published;
    }

    /**
     * Install a previously published mapping (e.g. loaded from the database).
     */
    restore(saved: CommunityAssignment): void {
        this.currentVersion = Object.freeze({ ...saved, assignment: new Map(saved.assignment) });
        this.nextVersion = Math.max(this.nextVersion, saved.version + 1);
    }

    current(): CommunityAssignment | null {
        return this.currentVersion;
    }

    /**
     * Community of an entity in the current mapping. Only meaningful within that version.
     */
    communityOf(entityId: string): Community | undefined {
        const mapping = this.currentVersion;
        if (!mapping) return undefined;
        const id = mapping.assignment.get(entityId);
        return id === undefined ? undefined : mapping.communities.find((community) => community.id === id);
    }
}
