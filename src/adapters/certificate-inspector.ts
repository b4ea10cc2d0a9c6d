import { connect } from 'node:tls';

export interface CertificateInfo {
  validTo: Date;
  issuer: string | null;
}

export interface CertificateInspector {
  inspect(hostname: string): Promise<CertificateInfo>;
}

export class TlsCertificateInspector implements CertificateInspector {
  public constructor(private readonly timeoutMs: number) {}

  public inspect(hostname: string): Promise<CertificateInfo> {
    return new Promise((resolve, reject) => {
      const socket = connect({ host: hostname, port: 443, servername: hostname, rejectUnauthorized: false }, () => {
        const certificate = socket.getPeerCertificate();
        socket.end();

        if (typeof certificate.valid_to !== 'string' || certificate.valid_to.length === 0) {
          reject(new Error(`No certificate presented by ${hostname}.`));
          return;
        }

        resolve({
          validTo: new Date(certificate.valid_to),
          issuer: typeof certificate.issuer?.O === 'string' ? certificate.issuer.O : null
        });
      });

      socket.setTimeout(this.timeoutMs, () => {
        socket.destroy(new Error(`TLS handshake with ${hostname} timed out.`));
      });
      socket.once('error', reject);
    });
  }
}
