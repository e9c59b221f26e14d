/**
 * Plan de vistas por tarea: poses de camara y categorias de render.
 *
 * Todo es tabla; el generador solo itera `resolverPlanVistas(tarea)` x `resolverPosesCamara(tarea)`.
 */
import type { NumeroTarea } from './catalogoEntregas';

export const POSES_CAMARA = [
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
] as const;

export type PoseCamara = (typeof POSES_CAMARA)[number];

export type VistaPlan = {
  titulo: string;
  prefijo: string;
};

type CategoriaVista = VistaPlan & { tareas: readonly NumeroTarea[] };

// El orden de esta tabla es el orden de las subsecciones del reporte.
const CATEGORIAS: readonly CategoriaVista[] = [
  { titulo: 'Standard View', prefijo: 'standard', tareas: [1, 2, 3, 4, 5, 6] },
  { titulo: 'Backface Culling View', prefijo: 'culling', tareas: [3, 4, 5, 6] },
  { titulo: 'Wireframe View', prefijo: 'wireframe', tareas: [3, 4] },
  { titulo: 'Wireframe and Backframe Culling View', prefijo: 'culling_wireframe', tareas: [3, 4] },
  { titulo: 'Normals View', prefijo: 'normals', tareas: [5] },
  { titulo: 'Normals Backface Culling View', prefijo: 'culling_normals', tareas: [5] },
  { titulo: 'Texcoords View', prefijo: 'texcoords', tareas: [6] },
  { titulo: 'Texcoords Backface Culling View', prefijo: 'culling_texcoords', tareas: [6] }
];

export function resolverPosesCamara(tarea: NumeroTarea): readonly PoseCamara[] {
  return tarea === 1 ? ['front'] : POSES_CAMARA;
}

export function resolverPlanVistas(tarea: NumeroTarea): VistaPlan[] {
  return CATEGORIAS.filter((categoria) => categoria.tareas.includes(tarea)).map(({ titulo, prefijo }) => ({
    titulo,
    prefijo
  }));
}

export function nombreArchivoImagen(prefijo: string, pose: string) {
  return `${prefijo}_${pose}.png`;
}

export function nombreArchivoDiferencia(nombreArchivo: string) {
  return `diff_${nombreArchivo}`;
}
