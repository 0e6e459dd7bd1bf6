import pc from 'picocolors'

export const colors = {
    error: (text: string) => pc.red(text),
    dim: (text: string) => pc.dim(text),
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}
