declare module "libmime" {
  namespace libmime {
    interface HeaderValue {
      value: string | false;
      params: Record<string, string>;
    }
  }

  const libmime: {
    decodeWords(str: string): string;
    parseHeaderValue(str: string): libmime.HeaderValue;
  };
  export = libmime;
}
