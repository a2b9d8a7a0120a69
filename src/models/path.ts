/** An (owner, channel, asset) triple identifying one rate-limited transfer route. */
export interface Path {
    readonly owner: string;
    readonly channel: string;
    readonly asset: string;
}

export const createPath = (owner: string, channel: string, asset: string): Path =>
    Object.freeze({ owner, channel, asset });

export const pathEquals = (a: Path, b: Path): boolean =>
    a.owner === b.owner && a.channel === b.channel && a.asset === b.asset;

// Components are URI-encoded so a ':' inside one cannot collide with another path.
export const pathKey = (path: Path): string =>
    [path.owner, path.channel, path.asset].map(encodeURIComponent).join(':');
