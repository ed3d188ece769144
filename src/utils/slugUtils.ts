export function generateSlug(name: string, existingSlugs: ReadonlySet<string>): string {
    const baseSlug = name
        .toLowerCase()
        .replace(/&/g, ' and ')
        .replace(/[^a-z0-9 -]/g, '') // Remove special chars
        .trim()
        .replace(/\s+/g, '-')        // Spaces to hyphens
        .replace(/-+/g, '-')         // Collapse multiple hyphens
        .substring(0, 50);

    let finalSlug = baseSlug;
    let counter = 1;

    while (existingSlugs.has(finalSlug)) {
        finalSlug = `${baseSlug}-${counter}`;
        counter++;
    }

    return finalSlug;
}
