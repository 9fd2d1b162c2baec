declare module 'whois' {
  interface WhoisOptions {
    server?: string;
    follow?: number;
    timeout?: number;
    verbose?: boolean;
    bind?: string;
  }

  type WhoisCallback = (err: Error | null, data: string) => void;

  function lookup(domain: string, callback: WhoisCallback): void;
  function lookup(domain: string, options: WhoisOptions, callback: WhoisCallback): void;

  // CommonJS package: the ESM default import is module.exports
  const whois: {
    lookup: typeof lookup;
  };

  export default whois;
  export { WhoisOptions, WhoisCallback };
}
