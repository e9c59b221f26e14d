import { describe, expect, it } from 'vitest';
import {
  POSES_CAMARA,
  nombreArchivoDiferencia,
  nombreArchivoImagen,
  resolverPlanVistas,
  resolverPosesCamara
} from '../src/modulos/modulo_reporte/domain/planVistas';

const prefijos = (tarea: 1 | 2 | 3 | 4 | 5 | 6) => resolverPlanVistas(tarea).map((vista) => vista.prefijo);

describe('planVistas', () => {
  it('usa solo la pose frontal en la tarea 1', () => {
    expect(resolverPosesCamara(1)).toEqual(['front']);
  });

  it('usa las 14 poses en orden fijo desde la tarea 2', () => {
    const esperadas = [
      'front',
      'front_right',
      'right',
      'front_left',
      'left',
      'front_up',
      'up',
      'front_down',
      'down',
      'right_up',
      'right_down',
      'left_up',
      'left_down',
      'back'
    ];
    for (const tarea of [2, 3, 4, 5, 6] as const) {
      expect(resolverPosesCamara(tarea)).toEqual(esperadas);
    }
    expect(POSES_CAMARA).toHaveLength(14);
  });

  it('arma el plan de vistas por tarea', () => {
    expect(prefijos(1)).toEqual(['standard']);
    expect(prefijos(2)).toEqual(['standard']);
    expect(prefijos(3)).toEqual(['standard', 'culling', 'wireframe', 'culling_wireframe']);
    expect(prefijos(4)).toEqual(['standard', 'culling', 'wireframe', 'culling_wireframe']);
    expect(prefijos(5)).toEqual(['standard', 'culling', 'normals', 'culling_normals']);
    expect(prefijos(6)).toEqual(['standard', 'culling', 'texcoords', 'culling_texcoords']);
  });

  it('conserva los titulos de subseccion', () => {
    expect(resolverPlanVistas(6).map((vista) => vista.titulo)).toEqual([
      'Standard View',
      'Backface Culling View',
      'Texcoords View',
      'Texcoords Backface Culling View'
    ]);
  });

  it('construye nombres de archivo', () => {
    expect(nombreArchivoImagen('culling_normals', 'left_up')).toBe('culling_normals_left_up.png');
    expect(nombreArchivoDiferencia('standard_front.png')).toBe('diff_standard_front.png');
  });
});
