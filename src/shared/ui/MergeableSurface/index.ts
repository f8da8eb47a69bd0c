export { MergeableSurface, surfaceEdges } from './MergeableSurface';
export type {
    MergeableSurfaceProps,
    SurfaceItem,
    SurfaceSlice,
    SurfaceGap,
    SurfaceItemKey,
    SurfaceEdges,
} from './MergeableSurface';
