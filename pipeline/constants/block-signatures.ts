export interface BlockBodySignature {
  label: string;
  pattern: RegExp;
}

export interface BlockHeaderSignature {
  label: string;
  /** lower-case header name */
  header: string;
  /** null matches on the header's presence alone */
  valuePattern: RegExp | null;
}

export const BLOCK_BODY_SIGNATURES: readonly BlockBodySignature[] = [
  {
    label: "Cloudflare challenge",
    pattern:
      /Just a moment|Performing security verification|Verifying you are human|Enable JavaScript and cookies to continue|Attention Required! \| Cloudflare/i
  },
  {
    label: "Incapsula rejection",
    pattern: /Request unsuccessful\. Incapsula incident ID/i
  },
  {
    label: "WAF rejection",
    pattern: /The requested URL was rejected|Request Rejected|Web Application Firewall/i
  },
  {
    label: "Access denied page",
    pattern: /<title>\s*Access Denied\s*<\/title>|You don't have permission to access/i
  },
  {
    label: "CAPTCHA prompt",
    pattern: /g-recaptcha|h-captcha|captcha-delivery|Please complete the security check/i
  }
];

export const BLOCK_HEADER_SIGNATURES: readonly BlockHeaderSignature[] = [
  { label: "X-WAF block marker", header: "x-waf", valuePattern: /block/i },
  { label: "Cloudflare mitigation", header: "cf-mitigated", valuePattern: /challenge/i },
  { label: "AWS WAF action", header: "x-amzn-waf-action", valuePattern: /block|captcha|challenge/i },
  { label: "Sucuri block", header: "x-sucuri-block", valuePattern: null }
];
