/**
 * Request signing for vendors that authenticate with a shared secret.
 *
 * Both algorithms depend on exact parameter ordering and encoding; any change
 * here breaks authentication against the live APIs.
 */

import crypto from 'crypto';

export type SignableParams = Record<string, string | number>;

/**
 * Sorted key=value pairs joined with "&", values left unencoded.
 */
export function canonicalQueryString(params: SignableParams): string {
    return Object.keys(params)
        .sort()
        .map(key => `${key}=${params[key]}`)
        .join('&');
}

export interface TencentSignatureTarget {
    method: 'GET' | 'POST';
    host: string;
    path: string;
}

export const TENCENT_SIGNATURE_TARGET: TencentSignatureTarget = {
    method: 'GET',
    host: 'tmt.tencentcloudapi.com',
    path: '/',
};

/**
 * Tencent Cloud API v2 signature (HmacSHA1).
 *
 * String to sign: METHOD + host + path + "?" + canonical query.
 */
export function tencentSignature(
    secretKey: string,
    params: SignableParams,
    target: TencentSignatureTarget = TENCENT_SIGNATURE_TARGET
): string {
    const stringToSign = `${target.method}${target.host}${target.path}?${canonicalQueryString(params)}`;
    return crypto.createHmac('sha1', secretKey).update(stringToSign, 'utf8').digest('base64');
}

/**
 * Baidu general translation sign: md5(appid + q + salt + appkey), hex.
 */
export function baiduSignature(appId: string, query: string, salt: string | number, appKey: string): string {
    return crypto.createHash('md5').update(`${appId}${query}${salt}${appKey}`, 'utf8').digest('hex');
}
