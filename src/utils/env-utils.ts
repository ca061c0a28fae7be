export enum NodeEnv {
    Development = 'dev',
    Production = 'prod',
    Test = 'test',
}

const TRUTHY_VALUES = ['y', 'yes', 't', 'true', 'on', '1']

export function determineNodeEnv(env: Record<string, string | undefined> = process.env): NodeEnv {
    const nodeEnv = env.NODE_ENV?.toLowerCase()
    if (nodeEnv?.startsWith(NodeEnv.Test)) {
        return NodeEnv.Test
    }
    if (nodeEnv?.startsWith(NodeEnv.Development)) {
        return NodeEnv.Development
    }
    // DEBUG=1 gives pretty logs and a local cluster without setting NODE_ENV
    if (TRUTHY_VALUES.includes(String(env.DEBUG).toLowerCase())) {
        return NodeEnv.Development
    }
    return NodeEnv.Production
}

export const isTestEnv = (): boolean => determineNodeEnv() === NodeEnv.Test
export const isDevEnv = (): boolean => determineNodeEnv() === NodeEnv.Development
