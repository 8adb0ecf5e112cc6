const UNSAFE_CHARS = /[^A-Za-z0-9_.-]/g

/**
 * Reduces a client-supplied filename to a flat ASCII name that is safe to
 * join onto a directory: `../../etc/passwd` becomes `etc_passwd`.
 */
export function secureFilename(name: string | undefined, fallback = 'upload'): string {
    const ascii = (name ?? '').normalize('NFKD').replace(/[^\x00-\x7f]/g, '')
    const flat = ascii.replace(/[/\\]/g, ' ')
    const cleaned = flat
        .split(/\s+/)
        .filter(Boolean)
        .join('_')
        .replace(UNSAFE_CHARS, '')
        .replace(/^[._]+|[._]+$/g, '')
    return cleaned || fallback
}

/**
 * multer 1.x hands back multipart filenames decoded as latin1; browsers and
 * fetch send them as raw UTF-8 bytes.
 */
export function decodeUploadName(name: string): string {
    return Buffer.from(name, 'latin1').toString('utf8')
}
