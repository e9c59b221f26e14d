import { describe, expect, it } from 'vitest';
import { CLAVES_ENTREGA, resolverEntrega } from '../src/modulos/modulo_reporte/domain/catalogoEntregas';

function capturarError(fn: () => unknown) {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Se esperaba un error');
}

describe('catalogoEntregas', () => {
  it('resuelve cada submission a su numero de tarea y nombre', () => {
    expect(CLAVES_ENTREGA.map((clave) => resolverEntrega(clave).tarea)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(resolverEntrega('submission4')).toEqual({ tarea: 4, clave: 'task4', nombre: 'Task 4' });
  });

  it('rechaza claves fuera del catalogo', () => {
    for (const clave of ['submission7', 'submission3-retry', 'task1', '']) {
      expect(capturarError(() => resolverEntrega(clave))).toMatchObject({ codigo: 'ENTREGA_DESCONOCIDA' });
    }
  });
});
