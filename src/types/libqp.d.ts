declare module "libqp" {
  const libqp: {
    decode(str: string): Buffer;
  };
  export = libqp;
}
