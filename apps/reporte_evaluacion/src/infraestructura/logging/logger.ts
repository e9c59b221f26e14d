/**
 * logger
 *
 * Responsabilidad: Logging estructurado (JSON por linea) del generador de reportes.
 * Limites: La salida de consola la consume el job de CI; no mezclar texto libre.
 */
export type NivelLog = 'info' | 'warn' | 'error' | 'ok' | 'system';

type Meta = Record<string, unknown>;

const servicio = 'reporte-evaluacion';

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    const codigo = 'codigo' in error ? error.codigo : undefined;
    return {
      name: error.name,
      message: error.message,
      ...(typeof codigo === 'string' ? { codigo } : {}),
      stack: error.stack
    };
  }
  return { value: String(error) };
}

function nivelEstandar(level: NivelLog): 'info' | 'warn' | 'error' {
  if (level === 'warn') return 'warn';
  if (level === 'error') return 'error';
  return 'info';
}

// Se lee en cada llamada para que las pruebas puedan alternarlo.
function silenciado() {
  return process.env.LOG_SILENCIOSO === '1';
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  const levelStd = nivelEstandar(level);
  if (levelStd !== 'error' && silenciado()) return;
  const entry = {
    timestamp: new Date().toISOString(),
    service: servicio,
    env: process.env.NODE_ENV ?? 'development',
    level: levelStd,
    message: msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (levelStd === 'error') console.error(line);
  else if (levelStd === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}
