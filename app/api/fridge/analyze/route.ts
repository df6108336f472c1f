import { NextResponse } from 'next/server'
import { analyzeFridgeImage } from '@/lib/fridge/analyze'
import { getFridgeServices } from '@/lib/fridge/runtime'
import { fridgePreferencesSchema } from '@/lib/fridge/schema'
import { HttpError, errorResponse } from '@/lib/http/responses'

export const runtime = 'nodejs'

export async function POST(request: Request) {
  try {
    const contentType = request.headers.get('content-type') ?? ''
    if (!contentType.includes('multipart/form-data')) {
      throw new HttpError('Upload the image as multipart/form-data.', 415, { code: 'unsupported_media_type' })
    }

    const formData = await request.formData()
    const imageValue = formData.get('image')
    if (!(imageValue instanceof File)) {
      throw new HttpError('An image file is required.', 400, { code: 'missing_image' })
    }

    const preferences = fridgePreferencesSchema.parse({
      cuisine: formData.get('cuisine'),
      diet: formData.get('diet'),
      maxReadyMinutes: formData.get('maxReadyMinutes'),
      count: formData.get('count'),
    })

    const analysis = await analyzeFridgeImage(
      { bytes: new Uint8Array(await imageValue.arrayBuffer()), mimeType: imageValue.type },
      preferences,
      getFridgeServices(),
    )

    return NextResponse.json(analysis)
  } catch (error) {
    return errorResponse(error, '[api/fridge/analyze]')
  }
}
