/**
 * Error estandar para fallos controlados del generador.
 *
 * Notas:
 * - `codigo` debe ser estable (orientado a maquina) para que el pipeline de CI
 *   pueda distinguir la causa sin parsear mensajes.
 * - `codigoSalida` es el exit code que usa el CLI al abortar.
 * - `detalles` se usa principalmente para errores de validacion (p. ej. `zod.flatten()`).
 */
export class ErrorAplicacion extends Error {
  codigo: string;
  codigoSalida: number;
  detalles?: unknown;

  constructor(codigo: string, mensaje: string, codigoSalida = 1, detalles?: unknown) {
    super(mensaje);
    this.name = 'ErrorAplicacion';
    this.codigo = codigo;
    this.codigoSalida = codigoSalida;
    this.detalles = detalles;
  }
}

export function esErrorAplicacion(error: unknown): error is ErrorAplicacion {
  return error instanceof ErrorAplicacion;
}
