export interface Releasable {
    destroy(): void;
}

/**
 * Runs `use` with a resource acquired for a single operation and releases it
 * on every exit path.
 */
export async function withResource<R extends Releasable, T>(
    resource: R,
    use: (resource: R) => Promise<T>
): Promise<T> {
    try {
        return await use(resource);
    } finally {
        resource.destroy();
    }
}
