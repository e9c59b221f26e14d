/**
 * Catalogo fijo de entregas (tag de CI -> tarea).
 */
import { z } from 'zod';
import { ErrorAplicacion } from '../../../compartido/errores/errorAplicacion';

export type NumeroTarea = 1 | 2 | 3 | 4 | 5 | 6;

export type Entrega = {
  tarea: NumeroTarea;
  clave: string;
  nombre: string;
};

export const ENTREGAS = {
  submission1: { tarea: 1, clave: 'task1', nombre: 'Task 1' },
  submission2: { tarea: 2, clave: 'task2', nombre: 'Task 2' },
  submission3: { tarea: 3, clave: 'task3', nombre: 'Task 3' },
  submission4: { tarea: 4, clave: 'task4', nombre: 'Task 4' },
  submission5: { tarea: 5, clave: 'task5', nombre: 'Task 5' },
  submission6: { tarea: 6, clave: 'task6', nombre: 'Task 6' }
} as const satisfies Record<string, Entrega>;

export type ClaveEntrega = keyof typeof ENTREGAS;

export const CLAVES_ENTREGA = [
  'submission1',
  'submission2',
  'submission3',
  'submission4',
  'submission5',
  'submission6'
] as const satisfies readonly ClaveEntrega[];

export const esquemaClaveEntrega = z.enum(CLAVES_ENTREGA);

export function resolverEntrega(clave: string): Entrega {
  const resultado = esquemaClaveEntrega.safeParse(clave);
  if (!resultado.success) {
    throw new ErrorAplicacion('ENTREGA_DESCONOCIDA', `Entrega desconocida: ${clave}`, 1, {
      clavesValidas: CLAVES_ENTREGA
    });
  }
  return ENTREGAS[resultado.data];
}
