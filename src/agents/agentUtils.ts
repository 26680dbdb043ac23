import { Capability, describeCapability } from '../capabilities/Capability';

const NONE = '(none)';

/**
 * Renders the capabilities an agent owns as prompt lines.
 *
 * Each capability becomes one line:
 * - name: description
 *
 * Returns "(none)" when the agent has no capabilities.
 */
export function formatCapabilities(capabilities: readonly Capability[]): string {
    if (capabilities.length === 0) return NONE;
    return capabilities
        .map(describeCapability)
        .map(({ name, description }) => `- ${name}: ${description}`)
        .join('\n');
}

/**
 * Renders the call context as `- key: value` lines, skipping empty values.
 */
export function formatCallContext(context: Readonly<Record<string, string>>): string {
    const lines = Object.entries(context)
        .filter(([, value]) => value.trim() !== '')
        .map(([key, value]) => `- ${key}: ${value}`);
    return lines.length > 0 ? lines.join('\n') : NONE;
}
