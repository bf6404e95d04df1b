/** Error when container bytes or elements do not follow the surface layout. */
export class SurfaceFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SurfaceFormatError'
  }
}
