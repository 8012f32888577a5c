/**
 * Velocidad de descarga y ETA de una tarea usando media móvil exponencial (EMA).
 *
 * start() inicia la sesión; update() recibe bytes acumulados y total (o null si se
 * desconoce) y devuelve speedBytesPerSec y remainingTime. Cada ProgressAggregator
 * posee su propia instancia.
 *
 * @module engines/SpeedTracker
 */

export interface SpeedUpdateResult {
  speedBytesPerSec: number;
  /** Segundos restantes estimados; null sin total conocido o sin velocidad. */
  remainingTime: number | null;
}

export class SpeedTracker {
  private readonly alpha: number;
  private readonly minTimeDelta: number;
  private readonly now: () => number;

  private sessionStartTime = 0;
  private sessionDownloaded = 0;
  private lastUpdate = 0;
  private lastDownloaded = 0;
  private emaSpeed = 0;
  private emaRemainingTime: number | null = null;

  constructor(alpha = 0.3, minTimeDelta = 0.1, now: () => number = Date.now) {
    this.alpha = alpha;
    this.minTimeDelta = minTimeDelta;
    this.now = now;
  }

  /**
   * Reinicia la sesión. Al reanudar, pasar los bytes ya presentes para evitar un pico
   * de velocidad en el primer cálculo.
   */
  start(initialDownloadedBytes = 0): void {
    const now = this.now();
    this.sessionStartTime = now;
    this.sessionDownloaded = 0;
    this.lastUpdate = now;
    this.lastDownloaded = Math.max(0, initialDownloadedBytes);
    this.emaSpeed = 0;
    this.emaRemainingTime = null;
  }

  update(downloadedBytes: number, totalBytes: number | null): SpeedUpdateResult {
    const now = this.now();
    const timeDelta = (now - this.lastUpdate) / 1000;
    const bytesDelta = downloadedBytes - this.lastDownloaded;

    let instantSpeed = 0;
    if (timeDelta >= this.minTimeDelta && bytesDelta >= 0) {
      instantSpeed = bytesDelta / timeDelta;
    }

    if (bytesDelta > 0 || timeDelta >= this.minTimeDelta) {
      this.lastUpdate = now;
      this.lastDownloaded = downloadedBytes;
      if (bytesDelta > 0) {
        this.sessionDownloaded += bytesDelta;
      }
    }

    let speedBytesPerSec = 0;
    if (instantSpeed > 0) {
      this.emaSpeed =
        this.emaSpeed === 0 ? instantSpeed : this.alpha * instantSpeed + (1 - this.alpha) * this.emaSpeed;
      speedBytesPerSec = this.emaSpeed;
    } else if (this.emaSpeed > 0) {
      // Sin bytes nuevos: la media de sesión acota la EMA para que decaiga
      const totalElapsed = (now - this.sessionStartTime) / 1000;
      speedBytesPerSec =
        totalElapsed > 0 && this.sessionDownloaded > 0
          ? Math.min(this.emaSpeed, this.sessionDownloaded / totalElapsed)
          : this.emaSpeed;
    }

    let remainingTime: number | null = null;
    const remainingBytes = totalBytes === null ? 0 : totalBytes - downloadedBytes;
    if (speedBytesPerSec > 0 && remainingBytes > 0) {
      const instantRemaining = remainingBytes / speedBytesPerSec;
      this.emaRemainingTime =
        this.emaRemainingTime === null || this.emaRemainingTime === 0
          ? instantRemaining
          : this.alpha * instantRemaining + (1 - this.alpha) * this.emaRemainingTime;
      remainingTime = Number.isFinite(this.emaRemainingTime) ? this.emaRemainingTime : instantRemaining;
    } else if (totalBytes !== null && remainingBytes <= 0) {
      remainingTime = 0;
    }

    return { speedBytesPerSec, remainingTime };
  }
}
