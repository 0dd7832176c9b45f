const DISABLE_STACKTRACE : boolean = true;

export class NcmError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class ConfigError          extends NcmError {}
export class IOError              extends NcmError {}
export class FormatError          extends NcmError {}
export class CryptoError          extends NcmError {}
export class PaddingError         extends CryptoError {}
