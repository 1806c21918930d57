import crypto from "crypto";

interface BuildSha256CacheKeyInput {
    identity: string;
    suffix?: string;
    length?: number;
}

export const buildSha256CacheKey = ({
    identity,
    suffix,
    length = 24,
}: BuildSha256CacheKeyInput): string => {
    const payload = suffix ? `${identity}:${suffix}` : identity;
    return crypto.createHash("sha256").update(payload).digest("hex").slice(0, length);
};
